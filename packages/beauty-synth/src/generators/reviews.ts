/**
 * Customer reviews sampled across the horizon
 */

import { BaseGenerator } from './base.js';
import type { DayContext, ReviewRecord, Sentiment } from '../types.js';
import type { RandomSource } from '../random/index.js';
import { sampleWithReplacement, uniformInt, weightedPick } from '../random/index.js';

export class ReviewsGenerator extends BaseGenerator<ReviewRecord> {
  readonly table = 'reviews';

  protected generateForBrand(
    brand: string,
    days: readonly DayContext[],
    random: RandomSource
  ): ReviewRecord[] {
    const { sentiments, reviewsPerBrand } = this.catalog;
    const dates = sampleWithReplacement(
      random,
      days.map(day => day.date),
      reviewsPerBrand
    );

    return dates.map(date => {
      const sentiment = weightedPick(random, sentiments.items, sentiments.weights);
      return { brand, date: new Date(date.getTime()), sentiment, rating: this.rating(sentiment, random) };
    });
  }

  /**
   * Star rating consistent with the sentiment
   */
  rating(sentiment: Sentiment, random: RandomSource): number {
    switch (sentiment) {
      case 'Positive':
        return uniformInt(random, 4, 5);
      case 'Neutral':
        return 3;
      case 'Negative':
        return uniformInt(random, 1, 2);
    }
  }
}
