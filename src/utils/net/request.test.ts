import { describe, it, expect, vi, afterEach } from 'vitest';
import { getLimit, getSessionId, getToday } from './request';
import { createMockRequest } from '../test/mockData';
import { ApiError } from '../../api/errors';

describe('Request Utility', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('getToday', () => {
    it('should read the date from the query', () => {
      const request = createMockRequest({ query: { today: '2024-03-15' } });

      expect(getToday(request).toISOString()).toBe('2024-03-15T00:00:00.000Z');
    });

    it('should default to the server date', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date(2024, 6, 4, 15, 0, 0));

      expect(getToday(createMockRequest()).toISOString()).toBe('2024-07-04T00:00:00.000Z');
    });

    it('should reject an invalid date with a 400', () => {
      const request = createMockRequest({ query: { today: '03/15/2024' } });

      expect(() => getToday(request)).toThrow(ApiError);
      expect(() => getToday(request)).toThrow('today must be a date in YYYY-MM-DD format');
    });
  });

  describe('getLimit', () => {
    it('should use the default when no limit is given', () => {
      expect(getLimit(createMockRequest(), 10)).toBe(10);
    });

    it('should read and cap the limit', () => {
      expect(getLimit(createMockRequest({ query: { limit: '25' } }), 10)).toBe(25);
      expect(getLimit(createMockRequest({ query: { limit: '500' } }), 10)).toBe(100);
    });

    it('should reject limits that are not positive integers', () => {
      expect(() => getLimit(createMockRequest({ query: { limit: '0' } }), 10)).toThrow('limit must be a positive integer');
      expect(() => getLimit(createMockRequest({ query: { limit: '2.5' } }), 10)).toThrow(
        'limit must be a positive integer',
      );
      expect(() => getLimit(createMockRequest({ query: { limit: 'ten' } }), 10)).toThrow(
        'limit must be a positive integer',
      );
    });
  });

  describe('getSessionId', () => {
    it('should prefer the header over the query', () => {
      const request = createMockRequest({
        headers: { 'x-session-id': 'from-header' },
        query: { sessionId: 'from-query' },
      });

      expect(getSessionId(request)).toBe('from-header');
    });

    it('should fall back to the query', () => {
      expect(getSessionId(createMockRequest({ query: { sessionId: 'from-query' } }))).toBe('from-query');
    });

    it('should return undefined without a session', () => {
      expect(getSessionId(createMockRequest())).toBeUndefined();
    });
  });
});
