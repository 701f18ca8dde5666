// shared/api/restaurants.types.ts
// Wire format of GET /restaurants/search. Field names are snake_case and
// rendered by front ends as-is.

export interface Location {
    lat: number;
    lng: number;
}

// Provider sub-objects (hours, payment, parking, reviews...) are passed through untouched.
export type OpaqueObject = Record<string, unknown>;

export interface RestaurantResult {
    place_id: string;
    name: string | null;
    address: string | null;
    location: Location | null;
    rating: number | null;
    user_ratings_total: number | null;
    price_level: number | null;
    types: string[];
    opening_hours: OpaqueObject | null;
    photos: OpaqueObject[] | null;
    website: string | null;
    phone_number: string | null;
    business_status: string | null;

    // Service options
    dine_in: boolean | null;
    takeout: boolean | null;
    delivery: boolean | null;
    curbside_pickup: boolean | null;
    reservable: boolean | null;

    // Dining times
    serves_breakfast: boolean | null;
    serves_lunch: boolean | null;
    serves_dinner: boolean | null;
    serves_brunch: boolean | null;

    // Beverages
    serves_beer: boolean | null;
    serves_wine: boolean | null;
    serves_cocktails: boolean | null;
    serves_coffee: boolean | null;

    // Food
    serves_vegetarian_food: boolean | null;
    serves_dessert: boolean | null;

    // Amenities
    outdoor_seating: boolean | null;
    live_music: boolean | null;
    good_for_children: boolean | null;
    good_for_groups: boolean | null;
    good_for_watching_sports: boolean | null;
    allows_dogs: boolean | null;
    restroom: boolean | null;
    menu_for_children: boolean | null;

    parking_options: OpaqueObject | null;
    payment_options: OpaqueObject | null;

    google_maps_uri: string | null;
    icon_mask_base_uri: string | null;
    utc_offset_minutes: number | null;
    current_opening_hours: OpaqueObject | null;
    regular_opening_hours: OpaqueObject | null;
    generative_summary: string | null;
    editorial_summary: string | null;

    reviews: OpaqueObject[] | null;
    review_summary: OpaqueObject | null;

    price_range: string | null;
    international_phone_number: string | null;
    national_phone_number: string | null;

    plus_code: OpaqueObject | null;
    viewport: OpaqueObject | null;
    address_components: OpaqueObject[] | null;
    adr_format_address: string | null;
}

// Echo of the filters actually applied (absent filters are omitted)
export interface SearchQueryEcho {
    location: string;
    cuisine?: string;
    min_rating?: number;
    min_reviews?: number;
    price_level?: number;
    open_now?: boolean;
    radius?: number;
    country?: string;
}

export interface SearchResponse {
    restaurants: RestaurantResult[];
    total_results: number;
    query: SearchQueryEcho;
}

export interface SearchParams {
    location: string;
    cuisine?: string;
    min_rating?: number;
    min_reviews?: number;
    price_level?: number;
    open_now?: boolean;
    radius?: number;
    country?: string;
}

export interface ApiErrorBody {
    error: string;
    detail: string;
}

export interface HealthResponse {
    status: "healthy";
    google_maps_configured: boolean;
}

export interface ServiceInfoResponse {
    message: string;
    version: string;
    status: "running";
}
