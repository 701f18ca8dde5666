import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { normalizePlace, normalizePlaces } from '../result-mapper.js';
import { MalformedUpstreamRecordError } from '../../../../lib/errors/search-errors.js';

describe('normalizePlace', () => {
  it('maps the well-known Text Search fields', () => {
    const result = normalizePlace({
      place_id: 'place-1',
      name: 'Trattoria Uno',
      formatted_address: '1 Main St, Springfield',
      geometry: {
        location: { lat: 40.1, lng: -73.9 },
        viewport: { northeast: { lat: 40.2, lng: -73.8 } }
      },
      rating: 4.5,
      user_ratings_total: 250,
      price_level: 2,
      types: ['restaurant', 'food', 42],
      opening_hours: { open_now: true },
      photos: [{ photo_reference: 'photo-ref-1', width: 400 }],
      business_status: 'OPERATIONAL',
      formatted_phone_number: '(555) 010-0100',
      plus_code: { compound_code: 'X' }
    });

    assert.equal(result.place_id, 'place-1');
    assert.equal(result.name, 'Trattoria Uno');
    assert.equal(result.address, '1 Main St, Springfield');
    assert.deepEqual(result.location, { lat: 40.1, lng: -73.9 });
    assert.equal(result.rating, 4.5);
    assert.equal(result.user_ratings_total, 250);
    assert.equal(result.price_level, 2);
    assert.deepEqual(result.types, ['restaurant', 'food']);
    assert.deepEqual(result.opening_hours, { open_now: true });
    assert.deepEqual(result.photos, [{ photo_reference: 'photo-ref-1', width: 400 }]);
    assert.equal(result.business_status, 'OPERATIONAL');
    assert.equal(result.phone_number, '(555) 010-0100');
    assert.deepEqual(result.plus_code, { compound_code: 'X' });
    assert.deepEqual(result.viewport, { northeast: { lat: 40.2, lng: -73.8 } });
  });

  it('maps a bare record to nulls, never to misleading defaults', () => {
    const result = normalizePlace({ place_id: 'bare' });

    assert.equal(result.name, null);
    assert.equal(result.address, null);
    assert.equal(result.location, null);
    assert.equal(result.rating, null);
    assert.equal(result.user_ratings_total, null);
    assert.equal(result.price_level, null);
    assert.deepEqual(result.types, []);
    assert.equal(result.opening_hours, null);
    assert.equal(result.dine_in, null);
    assert.equal(result.outdoor_seating, null);
    assert.equal(result.payment_options, null);
    assert.equal(result.reviews, null);
    assert.equal(result.editorial_summary, null);
  });

  it('always emits every schema field', () => {
    const result = normalizePlace({ place_id: 'bare' });
    assert.equal(Object.keys(result).length, 54);
    for (const [key, value] of Object.entries(result)) {
      if (key === 'place_id') continue;
      if (key === 'types') continue;
      assert.equal(value, null, `${key} should be null`);
    }
  });

  it('keeps zero values as real values', () => {
    const result = normalizePlace({
      place_id: 'zeros',
      rating: 0,
      user_ratings_total: 0,
      price_level: 0,
      geometry: { location: { lat: 0, lng: 0 } }
    });

    assert.equal(result.rating, 0);
    assert.equal(result.user_ratings_total, 0);
    assert.equal(result.price_level, 0);
    assert.deepEqual(result.location, { lat: 0, lng: 0 });
  });

  it('returns a null location when either coordinate is missing', () => {
    assert.equal(normalizePlace({ place_id: 'a', geometry: { location: { lat: 40.1 } } }).location, null);
    assert.equal(normalizePlace({ place_id: 'b', geometry: { location: { lng: -73.9 } } }).location, null);
    assert.equal(normalizePlace({ place_id: 'c', geometry: {} }).location, null);
  });

  it('nulls scalars of the wrong type', () => {
    const result = normalizePlace({
      place_id: 'typed',
      name: 12,
      rating: '4.5',
      user_ratings_total: Number.NaN,
      dine_in: 'yes',
      opening_hours: ['open'],
      photos: 'none'
    });

    assert.equal(result.name, null);
    assert.equal(result.rating, null);
    assert.equal(result.user_ratings_total, null);
    assert.equal(result.dine_in, null);
    assert.equal(result.opening_hours, null);
    assert.equal(result.photos, null);
  });

  it('passes amenity flags and rich sub-objects through', () => {
    const paymentOptions = { accepts_credit_cards: true, accepts_nfc: false, vendor_extension: { x: 1 } };
    const result = normalizePlace({
      place_id: 'rich',
      dine_in: true,
      delivery: false,
      outdoor_seating: true,
      serves_vegetarian_food: true,
      payment_options: paymentOptions,
      parking_options: { free_street_parking: true },
      reviews: [{ author_name: 'A. Reviewer', rating: 5 }],
      editorial_summary: { overview: 'Cozy neighborhood spot.' },
      generative_summary: 'Known for fresh pasta.',
      google_maps_uri: 'https://maps.example.test/?cid=1',
      utc_offset_minutes: -300
    });

    assert.equal(result.dine_in, true);
    assert.equal(result.delivery, false);
    assert.equal(result.outdoor_seating, true);
    assert.equal(result.serves_vegetarian_food, true);
    assert.equal(result.payment_options, paymentOptions);
    assert.deepEqual(result.parking_options, { free_street_parking: true });
    assert.deepEqual(result.reviews, [{ author_name: 'A. Reviewer', rating: 5 }]);
    assert.equal(result.editorial_summary, 'Cozy neighborhood spot.');
    assert.equal(result.generative_summary, 'Known for fresh pasta.');
    assert.equal(result.google_maps_uri, 'https://maps.example.test/?cid=1');
    assert.equal(result.utc_offset_minutes, -300);
  });

  it('falls back to the legacy url and utc_offset fields', () => {
    const result = normalizePlace({ place_id: 'legacy', url: 'https://maps.example.test/?cid=2', utc_offset: 60 });
    assert.equal(result.google_maps_uri, 'https://maps.example.test/?cid=2');
    assert.equal(result.utc_offset_minutes, 60);
  });

  it('throws MalformedUpstreamRecordError without a place_id', () => {
    for (const record of [{ name: 'No Id' }, { place_id: '' }, { place_id: '   ' }, { place_id: 7 }]) {
      assert.throws(() => normalizePlace(record, 3), (err: unknown) => {
        assert.ok(err instanceof MalformedUpstreamRecordError);
        assert.equal(err.index, 3);
        return true;
      });
    }
  });
});

describe('normalizePlaces', () => {
  it('drops records without place_id and preserves provider order', () => {
    const output = normalizePlaces([
      { place_id: 'first', name: 'First' },
      { name: 'Ghost' },
      { place_id: 'second', name: 'Second' },
      { place_id: 'third', name: 'Third' }
    ]);

    assert.equal(output.dropped, 1);
    assert.deepEqual(output.results.map((r) => r.place_id), ['first', 'second', 'third']);
  });

  it('drops entries that are not objects', () => {
    const output = normalizePlaces([null, 'place', 42, ['nested'], { place_id: 'ok-1', name: 'Kept' }]);

    assert.equal(output.dropped, 4);
    assert.deepEqual(output.results.map((r) => r.place_id), ['ok-1']);
    assert.equal(output.results[0]?.name, 'Kept');
  });

  it('returns an empty list for an empty provider response', () => {
    assert.deepEqual(normalizePlaces([]), { results: [], dropped: 0 });
  });
});
