/**
 * Unit tests for RequestValidator
 * @module @faultline/core/tests/unit/request-validator
 */

import { describe, it, expect } from 'vitest';

import { ErrorCode, type FaultRequest, type FaultTemplate } from '@faultline/shared';
import { RequestValidator } from '../../src';
import { testRequest } from '../helpers/fixtures';

const TEMPLATE: FaultTemplate = {
  templateId: 'cpu-throttle',
  version: 3,
  backend: 'chaos-mesh',
  composable: false,
  parameters: {
    load: { type: 'integer', default: 100, min: 1, max: 100 },
    mode: { type: 'string', enum: ['one', 'all'] },
    latency: { type: 'duration', required: true },
  },
  render: { path: 'cpu.yaml', definition: 'kind: a\n' },
};

const validator = new RequestValidator({ maxTtlSeconds: 3_600 });

function fieldsOf(request: FaultRequest): string[] {
  const result = validator.validate(request, TEMPLATE);
  return result.valid ? [] : result.error.details.map(d => d.field);
}

describe('RequestValidator', () => {
  it('should apply defaults and copy the request', () => {
    const request = testRequest({ ttlSeconds: 60, parameters: { latency: '50ms' } });
    const result = validator.validate(request, TEMPLATE);

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value.parameters).toEqual({ load: 100, latency: '50ms' });
      expect(result.value.templateVersion).toBe(3);
      expect(result.value.ttlSeconds).toBe(60);
      expect(result.value.request).toEqual(request);
      expect(result.value.request).not.toBe(request);
    }
  });

  it('should collect every violation in one error', () => {
    const request = testRequest({
      name: 'Not_A_Name',
      ttlSeconds: 7_200,
      selector: { pods: ['worker-0', 'worker-0'] },
      parameters: { load: 0, mode: 'some', extra: true },
    });
    const result = validator.validate(request, TEMPLATE);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.code).toBe(ErrorCode.VALIDATION_FAILED);
      expect(result.error.details.map(d => d.field)).toEqual([
        'metadata.name',
        'metadata.ttlSeconds',
        'spec.selector.pods[1]',
        'spec.parameters.load',
        'spec.parameters.mode',
        'spec.parameters.latency',
        'spec.parameters.extra',
      ]);
      expect(result.error.meta.templateId).toBe('cpu-throttle');
    }
  });

  it('should require a non-empty selector', () => {
    expect(fieldsOf(testRequest({ selector: {}, parameters: { latency: '1s' } }))).toEqual(['spec.selector']);
  });

  it('should check label selectors and labels', () => {
    const request = testRequest({
      selector: { labelSelectors: { 'bad key!': 'x' } },
      parameters: { latency: '1s' },
    });
    request.metadata.labels = { team: 'not valid!' };

    expect(fieldsOf(request)).toEqual(['metadata.labels.team', 'spec.selector.labelSelectors.bad key!']);
  });

  it('should check the duration format', () => {
    const result = validator.validate(testRequest({ parameters: { latency: 'soon' } }), TEMPLATE);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error.details).toEqual([{
        field: 'spec.parameters.latency',
        message: 'Invalid duration: soon',
        rule: 'format',
        expected: 'duration such as 30s, 5m, 1h30m',
        received: 'soon',
      }]);
    }
  });

  it('should reject a pinned version that is not loaded', () => {
    const request = { ...testRequest({ parameters: { latency: '1s' } }), templateVersion: 2 };

    expect(fieldsOf(request)).toEqual(['templateVersion']);
    expect(fieldsOf({ ...request, templateVersion: 3 })).toEqual([]);
  });

  it('should reject a request checked against another template', () => {
    expect(fieldsOf(testRequest({ templateId: 'pod-kill', parameters: { latency: '1s' } }))).toEqual(['templateId']);
  });

  it('should accept a TTL up to the configured maximum', () => {
    expect(fieldsOf(testRequest({ ttlSeconds: 3_600, parameters: { latency: '1s' } }))).toEqual([]);
    expect(fieldsOf(testRequest({ ttlSeconds: 0, parameters: { latency: '1s' } }))).toEqual(['metadata.ttlSeconds']);
  });
});
