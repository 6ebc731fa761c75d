/**
 * Base generator shared by the per-table generators
 */

import type { DayContext, TableName } from '../types.js';
import { ValidationError } from '../types.js';
import type { Catalog } from '../catalog/index.js';
import { DEFAULT_CATALOG } from '../catalog/index.js';
import type { RandomSource } from '../random/index.js';

export abstract class BaseGenerator<TRecord> {
  protected catalog: Catalog;

  constructor(catalog: Catalog = DEFAULT_CATALOG) {
    this.catalog = catalog;
  }

  /**
   * Table the generator fills; also the label its random stream is forked under
   */
  abstract readonly table: TableName;

  /**
   * Generation logic for one brand over the whole horizon
   */
  protected abstract generateForBrand(
    brand: string,
    days: readonly DayContext[],
    random: RandomSource
  ): TRecord[];

  /**
   * Generate one brand's rows. `days` must be in chronological order.
   */
  generate(brand: string, days: readonly DayContext[], random: RandomSource): TRecord[] {
    this.validateDays(days);
    return this.generateForBrand(brand, days, random.fork(this.table)).map(record =>
      Object.freeze(record)
    );
  }

  protected validateDays(days: readonly DayContext[]): void {
    for (let i = 1; i < days.length; i++) {
      const previous = days[i - 1];
      const current = days[i];
      if (previous && current && current.date.getTime() <= previous.date.getTime()) {
        throw new ValidationError('Days must be in strictly increasing date order', {
          index: i,
          previous: previous.date,
          current: current.date
        });
      }
    }
  }
}
