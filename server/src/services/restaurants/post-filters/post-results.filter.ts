/**
 * Post-Results Filter
 *
 * Filters the Text Search API cannot guarantee, applied to normalized results
 * in a fixed order: minRating -> minReviews -> priceLevel -> openNow.
 *
 * Unknown values are EXCLUDED under an active rating, review or open-now filter.
 * Price is already constrained upstream (minprice/maxprice), so a place without
 * a price level is kept.
 *
 * Filtering is stable: survivors keep their provider relevance order.
 */

import type { RestaurantResult } from '@api';

export interface PostFilterCriteria {
  minRating?: number;
  minReviews?: number;
  priceLevel?: number;
  openNow?: boolean;
}

export type PostFilterName = 'minRating' | 'minReviews' | 'priceLevel' | 'openNow';

export interface PostFilterStageStats {
  filter: PostFilterName;
  before: number;
  after: number;
  removed: number;
}

export interface PostFilterOutput {
  resultsFiltered: RestaurantResult[];
  stats: {
    before: number;
    after: number;
    removed: number;
    stages: PostFilterStageStats[];
  };
}

type Predicate = (result: RestaurantResult) => boolean;

function meetsMinRating(minRating: number): Predicate {
  return (result) => result.rating !== null && result.rating >= minRating;
}

function meetsMinReviews(minReviews: number): Predicate {
  return (result) => result.user_ratings_total !== null && result.user_ratings_total >= minReviews;
}

function matchesPriceLevel(priceLevel: number): Predicate {
  return (result) => result.price_level === null || result.price_level === priceLevel;
}

function isOpenNow(result: RestaurantResult): boolean {
  return result.opening_hours?.open_now === true;
}

/**
 * Ordered list of the predicates the criteria activate
 */
function activeStages(criteria: PostFilterCriteria): Array<{ filter: PostFilterName; keep: Predicate }> {
  const stages: Array<{ filter: PostFilterName; keep: Predicate }> = [];

  if (criteria.minRating !== undefined) {
    stages.push({ filter: 'minRating', keep: meetsMinRating(criteria.minRating) });
  }
  if (criteria.minReviews !== undefined) {
    stages.push({ filter: 'minReviews', keep: meetsMinReviews(criteria.minReviews) });
  }
  if (criteria.priceLevel !== undefined) {
    stages.push({ filter: 'priceLevel', keep: matchesPriceLevel(criteria.priceLevel) });
  }
  if (criteria.openNow === true) {
    stages.push({ filter: 'openNow', keep: isOpenNow });
  }

  return stages;
}

/**
 * Apply post-result filters to normalized search results
 */
export function applyPostFilters(
  results: readonly RestaurantResult[],
  criteria: PostFilterCriteria
): PostFilterOutput {
  const stageStats: PostFilterStageStats[] = [];
  let current = [...results];

  for (const stage of activeStages(criteria)) {
    const before = current.length;
    current = current.filter(stage.keep);
    stageStats.push({
      filter: stage.filter,
      before,
      after: current.length,
      removed: before - current.length
    });
  }

  return {
    resultsFiltered: current,
    stats: {
      before: results.length,
      after: current.length,
      removed: results.length - current.length,
      stages: stageStats
    }
  };
}
