// shared/api/restaurants.format.ts
// Cell formatters for the results table.

export function formatPriceLevel(level: number | null | undefined): string {
    if (level === null || level === undefined) return "N/A";
    if (level === 0) return "Free";
    return "$".repeat(level);
}

export function formatRating(rating: number | null | undefined): string {
    if (rating === null || rating === undefined) return "N/A";
    return rating.toFixed(1);
}

export function formatReviewCount(count: number | null | undefined): string {
    if (count === null || count === undefined) return "N/A";
    return count.toLocaleString("en-US");
}
