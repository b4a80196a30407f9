/**
 * =============================================================================
 * TECHNICIAN DIRECTORY - Identity Service Client Tests
 * =============================================================================
 *
 * fetch is stubbed in-process; no request leaves the test.
 * =============================================================================
 */

import { TechnicianNotFoundError } from '../core/errors/AppError';
import {
  DirectorySettings,
  TechnicianDirectoryService
} from '../modules/technician/technician-directory.service';
import { logger } from '../shared/services/logger.service';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const BASE_URL = 'http://identity.test';

const SETTINGS: DirectorySettings = {
  enabled: true,
  failOpen: false,
  baseUrl: BASE_URL,
  timeoutMs: 50
};

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

function user(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return { id: 101, name: 'Sam Field', status: 'ACTIVE', role: 'TECHNICIAN', ...overrides };
}

describe('TechnicianDirectoryService', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
  });

  afterEach(() => {
    fetchMock.mockRestore();
    jest.clearAllMocks();
  });

  describe('validate', () => {
    it('accepts an active technician', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(user()));
      const directory = new TechnicianDirectoryService(SETTINGS);

      await expect(directory.validate(101)).resolves.toBeUndefined();
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe('http://identity.test/api/users/101');
    });

    it('tolerates a trailing slash on the base URL', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(user()));
      const directory = new TechnicianDirectoryService({ ...SETTINGS, baseUrl: `${BASE_URL}/` });

      await directory.validate(101);
      expect(fetchMock.mock.calls[0][0]).toBe('http://identity.test/api/users/101');
    });

    it('rejects an unknown technician', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({ message: 'Not Found' }, 404));
      const directory = new TechnicianDirectoryService(SETTINGS);

      const attempt = directory.validate(101);
      await expect(attempt).rejects.toBeInstanceOf(TechnicianNotFoundError);
      await expect(attempt).rejects.toThrow('Technician 101 not found');
    });

    it('rejects an inactive technician', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(user({ status: 'SUSPENDED' })));
      const directory = new TechnicianDirectoryService(SETTINGS);

      await expect(directory.validate(101)).rejects.toThrow('Technician 101 is not active');
    });

    it('rejects a user who is not a technician', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(user({ role: 'DISPATCHER' })));
      const directory = new TechnicianDirectoryService(SETTINGS);

      await expect(directory.validate(101)).rejects.toThrow('Technician 101 is not a technician');
    });

    it('fails closed when the service is unreachable', async () => {
      fetchMock.mockImplementation(async () => {
        throw new TypeError('fetch failed');
      });
      const directory = new TechnicianDirectoryService(SETTINGS);

      await expect(directory.validate(101))
        .rejects.toThrow('Technician 101 could not be validated - identity service unavailable');
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('fails open when configured to, logging a warning', async () => {
      fetchMock.mockImplementation(async () => {
        throw new TypeError('fetch failed');
      });
      const directory = new TechnicianDirectoryService({ ...SETTINGS, failOpen: true });

      await expect(directory.validate(101)).resolves.toBeUndefined();
      expect(logger.warn).toHaveBeenCalledWith(
        'Identity service unavailable, allowing technician (fail-open)',
        { technicianId: 101, error: 'fetch failed', circuit: 'CLOSED' }
      );
    });

    it.each([
      ['a server error', () => jsonResponse({ error: 'down' }, 503)],
      ['a malformed payload', () => jsonResponse({ id: 'abc' })],
    ])('treats %s as unavailability', async (_label, respond) => {
      fetchMock.mockImplementation(async () => respond());
      const directory = new TechnicianDirectoryService(SETTINGS);

      await expect(directory.validate(101))
        .rejects.toThrow('Technician 101 could not be validated - identity service unavailable');
    });

    it('treats a slow service as unavailable', async () => {
      fetchMock.mockImplementation(() => new Promise<Response>(() => undefined));
      const directory = new TechnicianDirectoryService({ ...SETTINGS, timeoutMs: 10 });

      await expect(directory.validate(101))
        .rejects.toThrow('Technician 101 could not be validated - identity service unavailable');
    });

    it('stops calling the service once the circuit opens', async () => {
      fetchMock.mockImplementation(async () => {
        throw new TypeError('fetch failed');
      });
      const directory = new TechnicianDirectoryService({ ...SETTINGS, failOpen: true });

      for (let i = 0; i < 6; i++) {
        await directory.validate(101);
      }
      expect(fetchMock).toHaveBeenCalledTimes(5);
      expect(logger.warn).toHaveBeenCalledWith('Identity service circuit opened', { from: 'CLOSED', to: 'OPEN' });
      expect(logger.warn).toHaveBeenLastCalledWith(
        'Identity service unavailable, allowing technician (fail-open)',
        { technicianId: 101, error: "Circuit 'identity-service' is open", circuit: 'OPEN' }
      );
    });

    it('does nothing when validation is disabled', async () => {
      const directory = new TechnicianDirectoryService({ ...SETTINGS, enabled: false });

      await expect(directory.validate(101)).resolves.toBeUndefined();
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('getInfo', () => {
    it('returns the directory record', async () => {
      fetchMock.mockImplementation(async () => jsonResponse(user()));
      const directory = new TechnicianDirectoryService(SETTINGS);

      expect(await directory.getInfo(101)).toEqual({
        id: 101,
        name: 'Sam Field',
        status: 'ACTIVE',
        role: 'TECHNICIAN'
      });
    });

    it('returns null for an unknown technician', async () => {
      fetchMock.mockImplementation(async () => jsonResponse({}, 404));
      const directory = new TechnicianDirectoryService(SETTINGS);

      expect(await directory.getInfo(101)).toBeNull();
    });

    it('returns null instead of throwing when unreachable', async () => {
      fetchMock.mockImplementation(async () => {
        throw new TypeError('fetch failed');
      });
      const directory = new TechnicianDirectoryService(SETTINGS);

      expect(await directory.getInfo(101)).toBeNull();
    });

    it('returns null when disabled', async () => {
      const directory = new TechnicianDirectoryService({ ...SETTINGS, enabled: false });

      expect(await directory.getInfo(101)).toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });
});
