/**
 * Stock catalog: three brands, five categories, five campaigns
 */

export const defaultCatalog = {
  categories: [
    {
      name: 'Skincare',
      basePrice: 45,
      products: ['Hydrating Serum', 'SPF50 Sunscreen', 'Vitamin C Cream', 'Gentle Cleanser']
    },
    {
      name: 'Makeup',
      basePrice: 35,
      products: ['Matte Lipstick', 'Glow Foundation', 'Brow Kit', 'Volumizing Mascara']
    },
    {
      name: 'Haircare',
      basePrice: 30,
      products: ['Argan Shampoo', 'Keratin Conditioner', 'Repair Mask', 'Curl Cream']
    },
    {
      name: 'Fragrance',
      basePrice: 75,
      products: ['Citrus Mist', 'Noir Eau de Parfum', 'Floral Bloom']
    },
    {
      name: 'Body',
      basePrice: 25,
      products: ['Shea Body Butter', 'Exfoliating Scrub', 'Aloe Body Gel']
    }
  ],
  brandCategoryWeights: {
    Radiance: [0.4, 0.3, 0.15, 0.1, 0.05],
    GlowUp: [0.3, 0.4, 0.1, 0.1, 0.1],
    PureBeauty: [0.25, 0.25, 0.3, 0.1, 0.1]
  },
  salesChannels: {
    items: ['Online', 'In-store', 'Wholesale'],
    weights: [0.6, 0.3, 0.1]
  },
  offers: {
    items: ['None', '10% Off', 'Buy 1 Get 1', 'Free Gift'],
    weights: [0.7, 0.15, 0.1, 0.05]
  },
  marketingChannels: [
    { channel: 'Organic', baseTraffic: 1200 },
    { channel: 'Paid', baseTraffic: 800 },
    { channel: 'Social', baseTraffic: 600 },
    { channel: 'Email', baseTraffic: 400 }
  ],
  socialPlatforms: ['Instagram', 'Facebook', 'TikTok', 'YouTube'],
  campaigns: ['Summer Glow', 'Holiday Sparkle', 'Winter Warmth', 'Spring Fresh', 'Loyalty Boost'],
  sentiments: {
    items: ['Positive', 'Neutral', 'Negative'],
    weights: [0.7, 0.2, 0.1]
  },
  reviewsPerBrand: 120
};
