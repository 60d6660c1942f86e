import { describe, it, expect } from 'vitest';
import { scrubSensitiveData, scrubRecord, scrubUrl, scrubBreadcrumbData } from './sentry-scrub';

describe('scrubSensitiveData', () => {
  describe('risk factors', () => {
    it('scrubs camelCase profile fields', () => {
      const input = { age: 65, sex: 'male', sbp: 140, totalChol: 5.0, hdl: 1.0, ldl: 3.5, vascCount: 1 };
      expect(scrubSensitiveData(input)).toEqual({
        age: '[Filtered]',
        sex: '[Filtered]',
        sbp: '[Filtered]',
        totalChol: '[Filtered]',
        hdl: '[Filtered]',
        ldl: '[Filtered]',
        vascCount: '[Filtered]',
      });
    });

    it('scrubs boolean risk factors and vascular flags', () => {
      const input = { smoker: true, diabetic: false, cad: true, strokeTia: false, pad: false };
      expect(scrubSensitiveData(input)).toEqual({
        smoker: '[Filtered]',
        diabetic: '[Filtered]',
        cad: '[Filtered]',
        strokeTia: '[Filtered]',
        pad: '[Filtered]',
      });
    });

    it('scrubs the vascular disease flags object', () => {
      const input = { vascularDisease: { cad: true, strokeTia: false, pad: false } };
      expect(scrubSensitiveData(input)).toEqual({ vascularDisease: '[Filtered]' });
    });

    it('scrubs snake_case variants', () => {
      const input = { systolic_bp: 130, total_cholesterol: 5.2, vasc_count: 0 };
      expect(scrubSensitiveData(input)).toEqual({
        systolic_bp: '[Filtered]',
        total_cholesterol: '[Filtered]',
        vasc_count: '[Filtered]',
      });
    });
  });

  describe('calculated results', () => {
    it('scrubs risk and LDL results', () => {
      const input = { baselineRisk: 54.6, finalRisk: 25.2, projectedLdl: 1.8, totalReduction: 47.5 };
      expect(scrubSensitiveData(input)).toEqual({
        baselineRisk: '[Filtered]',
        finalRisk: '[Filtered]',
        projectedLdl: '[Filtered]',
        totalReduction: '[Filtered]',
      });
    });
  });

  describe('therapies', () => {
    it('scrubs therapy selections via substring match', () => {
      const input = { currentTherapies: ['Atorvastatin 20 mg'], dischargeTherapies: [], statinName: 'x', addOns: [] };
      expect(scrubSensitiveData(input)).toEqual({
        currentTherapies: '[Filtered]',
        dischargeTherapies: '[Filtered]',
        statinName: '[Filtered]',
        addOns: '[Filtered]',
      });
    });
  });

  describe('identity', () => {
    it('scrubs names and the whole patient object', () => {
      const input = { patientName: 'Jane Doe', patient: { age: 60 }, name: 'Jane' };
      expect(scrubSensitiveData(input)).toEqual({
        patientName: '[Filtered]',
        patient: '[Filtered]',
        name: '[Filtered]',
      });
    });
  });

  describe('preserves non-sensitive data', () => {
    it('preserves general fields', () => {
      const input = { success: true, status: 500, error: 'Server error', method: 'POST' };
      expect(scrubSensitiveData(input)).toEqual(input);
    });

    it('preserves error types and messages', () => {
      const input = { type: 'InvalidInputError', message: 'hs-CRP must be greater than -1 mg/L', field: 'crp' };
      expect(scrubSensitiveData(input)).toEqual(input);
    });
  });

  describe('nested and recursive handling', () => {
    it('recursively scrubs nested objects', () => {
      const input = { request: { body: { summary: { finalRisk: 30 }, url: '/api/assessment' } } };
      expect(scrubSensitiveData(input)).toEqual({
        request: { body: { summary: { finalRisk: '[Filtered]' }, url: '/api/assessment' } },
      });
    });

    it('scrubs arrays of objects', () => {
      const input = { points: [{ date: '2026-01', ldl: 3.1 }, { date: '2026-04', ldl: 2.0 }] };
      expect(scrubSensitiveData(input)).toEqual({
        points: [{ date: '2026-01', ldl: '[Filtered]' }, { date: '2026-04', ldl: '[Filtered]' }],
      });
    });
  });

  describe('edge cases', () => {
    it('handles null and undefined', () => {
      expect(scrubSensitiveData(null)).toBe(null);
      expect(scrubSensitiveData(undefined)).toBe(undefined);
    });

    it('passes primitives through', () => {
      expect(scrubSensitiveData(42)).toBe(42);
      expect(scrubSensitiveData('text')).toBe('text');
    });

    it('stops at max depth', () => {
      expect(scrubSensitiveData({ a: { b: { c: 1 } } }, 2)).toEqual({ a: { b: '[Filtered]' } });
    });
  });
});

describe('scrubRecord', () => {
  it('scrubs top-level keys and nested values', () => {
    expect(scrubRecord({ egfr: 80, route: 'api.assessment', body: { crp: 2.0, status: 'ok' } })).toEqual({
      egfr: '[Filtered]',
      route: 'api.assessment',
      body: { crp: '[Filtered]', status: 'ok' },
    });
  });
});

describe('scrubUrl', () => {
  it('redacts sensitive query params in absolute URLs', () => {
    expect(scrubUrl('https://example.com/api/report?name=Jane&format=json')).toBe(
      'https://example.com/api/report?name=%5BFiltered%5D&format=json',
    );
  });

  it('keeps relative URLs relative', () => {
    expect(scrubUrl('/api/report?patient=Jane')).toBe('/api/report?patient=%5BFiltered%5D');
  });

  it('returns unchanged URLs without sensitive params', () => {
    expect(scrubUrl('/api/assessment?debug=1')).toBe('/api/assessment?debug=1');
  });
});

describe('scrubBreadcrumbData', () => {
  it('removes bodies and scrubs the URL', () => {
    const data = { url: '/api/report?name=Jane', method: 'POST', body: '{"patient":{}}', request_body_size: 120 };
    expect(scrubBreadcrumbData(data)).toEqual({ url: '/api/report?name=%5BFiltered%5D', method: 'POST' });
  });

  it('handles undefined data', () => {
    expect(scrubBreadcrumbData(undefined)).toBeUndefined();
  });
});
