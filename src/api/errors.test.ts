import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Response } from 'express';
import { ApiError, handle, sendError, statusForError } from './errors';
import { AppendError, ConnectionError, ValidationError } from '../utils/errors/errors';
import { createMockRequest } from '../utils/test/mockData';
import { err } from '../utils/log';

vi.mock('../utils/log', () => ({ err: vi.fn() }));

function createMockResponse() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

function asResponse(res: ReturnType<typeof createMockResponse>): Response {
  return res as unknown as Response;
}

describe('API errors', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('statusForError', () => {
    it('should map each error to its status', () => {
      expect(statusForError(new ApiError('Session not found', 404))).toBe(404);
      expect(statusForError(new ValidationError(['item must not be empty']))).toBe(400);
      expect(statusForError(new ConnectionError('Could not reach Google Sheets'))).toBe(503);
      expect(statusForError(new AppendError('Expenses', 'Append failed'))).toBe(500);
      expect(statusForError('boom')).toBe(500);
    });
  });

  describe('sendError', () => {
    it('should list validation problems', () => {
      const res = createMockResponse();

      sendError(asResponse(res), new ValidationError(['item must not be empty', 'amount must be at least 0.01']));

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        error: 'item must not be empty; amount must be at least 0.01',
        errors: ['item must not be empty', 'amount must be at least 0.01'],
      });
      expect(err).not.toHaveBeenCalled();
    });

    it('should log server-side failures', () => {
      const res = createMockResponse();

      sendError(asResponse(res), new ConnectionError('Could not reach Google Sheets'));

      expect(res.status).toHaveBeenCalledWith(503);
      expect(res.json).toHaveBeenCalledWith({ error: 'Could not reach Google Sheets' });
      expect(err).toHaveBeenCalledWith('Could not reach Google Sheets', { status: 503 });
    });

    it('should answer unknown values with a generic message', () => {
      const res = createMockResponse();

      sendError(asResponse(res), 42);

      expect(res.status).toHaveBeenCalledWith(500);
      expect(res.json).toHaveBeenCalledWith({ error: 'Unknown error' });
    });
  });

  describe('handle', () => {
    it('should answer with the result', async () => {
      const res = createMockResponse();

      await handle(async () => ({ ok: true }))(createMockRequest(), asResponse(res));

      expect(res.status).not.toHaveBeenCalled();
      expect(res.json).toHaveBeenCalledWith({ ok: true });
    });

    it('should answer with the error status', async () => {
      const res = createMockResponse();

      await handle(() => {
        throw new ApiError('Session not found', 404);
      })(createMockRequest(), asResponse(res));

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({ error: 'Session not found' });
    });
  });
});
