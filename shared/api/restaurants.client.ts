// shared/api/restaurants.client.ts
// Thin fetch-based client for the restaurant search API.

import type { ApiErrorBody, SearchParams, SearchResponse } from "./restaurants.types.js";

export const DEFAULT_API_BASE_URL = "http://localhost:8000";

export class RestaurantSearchClientError extends Error {
    constructor(message: string, public readonly status: number | null) {
        super(message);
        this.name = "RestaurantSearchClientError";
    }
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface RestaurantSearchClientOptions {
    baseUrl?: string;
    fetchFn?: FetchLike;
}

/**
 * Serializes search params in a fixed order, skipping the ones left undefined.
 */
export function buildSearchQueryString(params: SearchParams): string {
    const searchParams = new URLSearchParams();
    searchParams.append("location", params.location);

    if (params.cuisine) {
        searchParams.append("cuisine", params.cuisine);
    }
    if (params.min_rating !== undefined) {
        searchParams.append("min_rating", String(params.min_rating));
    }
    if (params.min_reviews !== undefined) {
        searchParams.append("min_reviews", String(params.min_reviews));
    }
    if (params.price_level !== undefined) {
        searchParams.append("price_level", String(params.price_level));
    }
    if (params.open_now !== undefined) {
        searchParams.append("open_now", String(params.open_now));
    }
    if (params.radius !== undefined) {
        searchParams.append("radius", String(params.radius));
    }
    if (params.country) {
        searchParams.append("country", params.country);
    }

    return searchParams.toString();
}

function isApiErrorBody(value: unknown): value is Partial<ApiErrorBody> {
    return typeof value === "object" && value !== null && ("detail" in value || "error" in value);
}

function isSearchResponse(value: unknown): value is SearchResponse {
    return (
        typeof value === "object" &&
        value !== null &&
        "restaurants" in value &&
        Array.isArray(value.restaurants) &&
        "total_results" in value &&
        typeof value.total_results === "number" &&
        "query" in value &&
        typeof value.query === "object" &&
        value.query !== null
    );
}

export class RestaurantSearchClient {
    private readonly baseUrl: string;
    private readonly fetchFn: FetchLike;

    constructor(options: RestaurantSearchClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
        this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    }

    async search(params: SearchParams, signal?: AbortSignal): Promise<SearchResponse> {
        const url = `${this.baseUrl}/restaurants/search?${buildSearchQueryString(params)}`;

        const response = await this.fetchFn(url, {
            method: "GET",
            headers: { Accept: "application/json" },
            signal,
        });

        if (!response.ok) {
            throw new RestaurantSearchClientError(await readErrorMessage(response), response.status);
        }

        const contentType = response.headers.get("content-type");
        if (!contentType || !contentType.includes("application/json")) {
            throw new RestaurantSearchClientError(
                `Expected JSON response but got ${contentType || "unknown content type"}`,
                response.status
            );
        }

        const text = await response.text();
        if (!text) {
            throw new RestaurantSearchClientError("Empty response body", response.status);
        }

        let result: unknown;
        try {
            result = JSON.parse(text);
        } catch {
            throw new RestaurantSearchClientError("Response body is not valid JSON", response.status);
        }
        if (!isSearchResponse(result)) {
            throw new RestaurantSearchClientError("Unexpected search response shape", response.status);
        }
        return result;
    }
}

async function readErrorMessage(response: Response): Promise<string> {
    const fallback = `HTTP ${response.status}: ${response.statusText}`;
    let body: unknown;
    try {
        body = await response.json();
    } catch {
        return fallback;
    }
    if (isApiErrorBody(body)) {
        return body.detail || body.error || fallback;
    }
    return fallback;
}
