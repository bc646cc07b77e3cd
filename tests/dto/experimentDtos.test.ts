// tests/dto/experimentDtos.test.ts

import { parseCreatePlanDto } from '../../src/experiments/dto/CreatePlanDto';
import { ExperimentDtoValidationError } from '../../src/experiments/dto/ExperimentDtoValidationError';
import {
  parseApplyWinnerDto,
  parseReadinessQuery,
  parseSignificanceDto,
} from '../../src/experiments/dto/PlanActionDtos';

function issuesOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ExperimentDtoValidationError) return err.issues;
    throw err;
  }
  throw new Error('expected a validation error');
}

describe('parseCreatePlanDto', () => {
  it('returns a typed input for a valid payload', () => {
    const input = parseCreatePlanDto({
      packageName: 'com.example.app',
      language: 'en-US',
      name: 'Screenshots',
      metric: 'cvr',
      type: 'graphics',
      trafficProportion: 0.3,
      variants: [
        { label: 'Control' },
        {
          label: 'Dark',
          title: 'Example Dark',
          assets: [{ imageType: 'phoneScreenshots', filePath: '/art/dark1.png' }],
        },
      ],
    });

    expect(input).toEqual({
      packageName: 'com.example.app',
      language: 'en-US',
      name: 'Screenshots',
      metric: 'cvr',
      type: 'graphics',
      trafficProportion: 0.3,
      variants: [
        { label: 'Control' },
        {
          label: 'Dark',
          title: 'Example Dark',
          assets: [{ imageType: 'phoneScreenshots', filePath: '/art/dark1.png' }],
        },
      ],
    });
  });

  it('passes an out-of-range traffic proportion through for the service to clamp', () => {
    const input = parseCreatePlanDto({
      packageName: 'p',
      language: 'en-US',
      name: 'n',
      metric: 'cvr',
      type: 'text',
      trafficProportion: 7,
      variants: [{ label: 'A' }],
    });

    expect(input.trafficProportion).toBe(7);
  });

  it('collects every issue of an invalid payload', () => {
    expect(
      issuesOf(() =>
        parseCreatePlanDto({
          packageName: '',
          language: 'en-US',
          name: 'n',
          metric: 'cvr',
          type: 'video',
          trafficProportion: 'half',
          variants: [
            { label: ' ' },
            { label: 'B', assets: [{ imageType: 'banner', filePath: 'x.png' }] },
          ],
        }),
      ),
    ).toEqual([
      '"packageName" must be a non-empty string.',
      '"trafficProportion" must be a finite number when provided.',
      '"type" must be one of: text, graphics, mixed.',
      '"variants[0].label" must be a non-empty string.',
      '"variants[1].assets[0].imageType" must be one of: phoneScreenshots, sevenInchScreenshots, tenInchScreenshots, tvScreenshots, wearScreenshots, icon, featureGraphic, tvBanner.',
    ]);
  });

  it('requires at least one variant', () => {
    expect(
      issuesOf(() =>
        parseCreatePlanDto({
          packageName: 'p',
          language: 'l',
          name: 'n',
          metric: 'm',
          type: 'text',
          variants: [],
        }),
      ),
    ).toEqual(['"variants" must be a non-empty array.']);
  });

  it('rejects a non-object payload', () => {
    expect(issuesOf(() => parseCreatePlanDto([]))).toEqual(['Payload must be a JSON object.']);
  });
});

describe('parseSignificanceDto', () => {
  it('keeps the metric key order and the optional sample count', () => {
    const request = parseSignificanceDto({
      metrics: {
        var_b: { visitors: 100, conversions: 5 },
        var_a: { visitors: 90, conversions: 9 },
      },
      samples: 5000,
    });

    expect([...request.metrics.keys()]).toEqual(['var_b', 'var_a']);
    expect(request.metrics.get('var_a')).toEqual({ visitors: 90, conversions: 9 });
    expect(request.samples).toBe(5000);
  });

  it('omits samples when not provided', () => {
    const request = parseSignificanceDto({ metrics: { var_a: { visitors: 1, conversions: 0 } } });
    expect(request).not.toHaveProperty('samples');
  });

  it('reports malformed counts per variant', () => {
    expect(
      issuesOf(() =>
        parseSignificanceDto({
          metrics: {
            var_a: { visitors: 10.5, conversions: 1 },
            var_b: 'lots',
          },
        }),
      ),
    ).toEqual([
      '"metrics.var_a.visitors" must be a non-negative integer.',
      '"metrics.var_b" must be an object with visitors and conversions.',
    ]);
  });

  it('requires a non-empty metrics object', () => {
    expect(issuesOf(() => parseSignificanceDto({ metrics: {} }))).toEqual([
      '"metrics" must be a non-empty object keyed by variantId.',
    ]);
  });
});

describe('parseApplyWinnerDto', () => {
  it('defaults changesNotSentForReview to false', () => {
    expect(parseApplyWinnerDto({ variantId: 'var_a' })).toEqual({
      variantId: 'var_a',
      changesNotSentForReview: false,
    });
  });

  it('validates field types', () => {
    expect(issuesOf(() => parseApplyWinnerDto({ changesNotSentForReview: 'yes' }))).toEqual([
      '"variantId" must be a non-empty string.',
      '"changesNotSentForReview" must be a boolean when provided.',
    ]);
  });
});

describe('parseReadinessQuery', () => {
  it('reads packageName and language', () => {
    expect(parseReadinessQuery({ packageName: 'com.example.app', language: 'en-US' })).toEqual({
      packageName: 'com.example.app',
      language: 'en-US',
    });
  });

  it('reports each missing parameter', () => {
    expect(issuesOf(() => parseReadinessQuery({ packageName: 'com.example.app' }))).toEqual([
      '"language" must be a non-empty string.',
    ]);
  });
});
