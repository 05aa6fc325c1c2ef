import type { FeedbackStats, StyleVariant } from '@tonecraft/shared';

export interface FeedbackRow {
  selectedVariant: StyleVariant;
  rating: number;
  createdAt: Date;
}

export const summarizeFeedback = (userId: string, rows: readonly FeedbackRow[]): FeedbackStats => {
  const variantCounts: Record<StyleVariant, number> = { direct: 0, gentle: 0, neutral: 0 };
  let ratingSum = 0;
  let last: Date | null = null;

  for (const row of rows) {
    variantCounts[row.selectedVariant] += 1;
    ratingSum += row.rating;
    if (!last || row.createdAt > last) last = row.createdAt;
  }

  return {
    userId,
    totalFeedback: rows.length,
    averageRating: rows.length > 0 ? Math.round((ratingSum / rows.length) * 100) / 100 : 0,
    variantCounts,
    lastFeedbackAt: last ? last.toISOString() : null,
  };
};
