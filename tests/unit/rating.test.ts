import { describe, expect, it } from 'vitest';

import {
  NO_FORECAST,
  aggregateRating,
  assessHours,
  dewPointRating,
  rateHour,
  visibilityRating,
  type HourlyWeather
} from '../../src/modules/weather/domain/rating';

const clearHour: HourlyWeather = { cloudCover: 0, precipitationProbability: 0, dewPoint: 0, visibility: 20_000 };
const hazyHour: HourlyWeather = { cloudCover: 50, precipitationProbability: 20, dewPoint: 7.5, visibility: 10_000 };

describe('dewPointRating', () => {
  it('is 100 below 5 degrees and 0 above 10', () => {
    expect(dewPointRating(4.9)).toBe(100);
    expect(dewPointRating(-3)).toBe(100);
    expect(dewPointRating(10.5)).toBe(0);
  });

  it('falls linearly between 5 and 10 degrees', () => {
    expect(dewPointRating(5)).toBe(100);
    expect(dewPointRating(7.5)).toBe(50);
    expect(dewPointRating(10)).toBe(0);
  });
});

describe('visibilityRating', () => {
  it('scales to 20 km and caps at 100', () => {
    expect(visibilityRating(10_000)).toBe(50);
    expect(visibilityRating(35_000)).toBe(100);
    expect(visibilityRating(0)).toBe(0);
  });
});

describe('rateHour', () => {
  it('scores a perfectly clear hour at 100', () => {
    expect(rateHour(clearHour)).toBeCloseTo(100, 10);
  });

  it('weights cloud, precipitation, dew point and visibility', () => {
    // 0.4*50 + 0.3*80 + 0.15*50 + 0.15*50
    expect(rateHour(hazyHour)).toBeCloseTo(59, 10);
  });

  it('treats missing metrics as the worst reading', () => {
    expect(
      rateHour({ cloudCover: null, precipitationProbability: null, dewPoint: null, visibility: null })
    ).toBeCloseTo(0, 10);
    expect(rateHour({ ...clearHour, visibility: null })).toBeCloseTo(85, 10);
  });

  it('clamps cover above 100 percent to zero contribution', () => {
    expect(rateHour({ ...clearHour, cloudCover: 120 })).toBeCloseTo(60, 10);
  });
});

describe('aggregateRating', () => {
  it('averages hourly ratings', () => {
    expect(aggregateRating([clearHour, hazyHour])).toBeCloseTo(79.5, 10);
  });

  it('is 0 for no hours', () => {
    expect(aggregateRating([])).toBe(0);
  });
});

describe('assessHours', () => {
  it('reports no forecast for an empty window', () => {
    expect(assessHours([], 50)).toEqual(NO_FORECAST);
  });

  it('warns when the rating is below the threshold', () => {
    const assessment = assessHours([hazyHour], 60);

    expect(assessment.forecastAvailable).toBe(true);
    expect(assessment.warning).toBe(true);
    expect(assessment.rating).toBeCloseTo(59, 10);
  });

  it('does not warn at or above the threshold', () => {
    expect(assessHours([clearHour], 99).warning).toBe(false);
    expect(assessHours([hazyHour], 50).warning).toBe(false);
  });
});
