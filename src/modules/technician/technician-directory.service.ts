/**
 * =============================================================================
 * TECHNICIAN MODULE - DIRECTORY SERVICE
 * =============================================================================
 *
 * Checks technician ids against the identity service before a task is
 * handed to them.
 *
 *   GET {baseUrl}/api/users/{id}  ->  { id, name, status, role }
 *
 * 404 means the technician does not exist. Network errors, timeouts,
 * non-404 error statuses, malformed payloads and an open circuit all count
 * as "unavailable", which is either tolerated (fail-open) or rejected
 * (fail-closed) depending on configuration.
 * =============================================================================
 */

import { z } from 'zod';
import { config } from '../../config/environment';
import { DIRECTORY_ACTIVE_STATUS, DIRECTORY_TECHNICIAN_ROLE } from '../../core/constants';
import { TechnicianNotFoundError } from '../../core/errors/AppError';
import { CircuitBreaker, CircuitState } from '../../shared/resilience/circuit-breaker';
import { logger } from '../../shared/services/logger.service';

// =============================================================================
// TYPES
// =============================================================================

const technicianInfoSchema = z.object({
  id: z.number().int(),
  name: z.string().nullable().optional(),
  status: z.string(),
  role: z.string()
});

export type TechnicianInfo = z.infer<typeof technicianInfoSchema>;

export interface DirectorySettings {
  /** false turns validation into a no-op */
  enabled: boolean;
  /** true lets assignments through when the identity service is unreachable */
  failOpen: boolean;
  baseUrl: string;
  timeoutMs: number;
}

/**
 * What the dispatch engine needs from the directory
 */
export interface TechnicianDirectory {
  /** Resolves when the technician may receive work, otherwise throws TechnicianNotFoundError */
  validate(technicianId: number): Promise<void>;
  /** Never throws; null when unknown, unreachable or disabled */
  getInfo(technicianId: number): Promise<TechnicianInfo | null>;
}

class DirectoryUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DirectoryUnavailableError';
  }
}

export const UNAVAILABLE_REASON = 'could not be validated - identity service unavailable';

// =============================================================================
// SERVICE
// =============================================================================

export class TechnicianDirectoryService implements TechnicianDirectory {
  private readonly breaker: CircuitBreaker;

  constructor(private readonly settings: DirectorySettings) {
    this.breaker = new CircuitBreaker({
      name: 'identity-service',
      failureThreshold: 5,
      resetTimeout: 30000,
      requestTimeout: settings.timeoutMs,
      onStateChange: (from, to) => {
        if (to === CircuitState.OPEN) {
          logger.warn('Identity service circuit opened', { from, to });
        } else {
          logger.info('Identity service circuit state change', { from, to });
        }
      }
    });
  }

  async validate(technicianId: number): Promise<void> {
    if (!this.settings.enabled) {
      logger.debug('Technician validation disabled', { technicianId });
      return;
    }

    let info: TechnicianInfo | null;
    try {
      info = await this.lookup(technicianId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      if (this.settings.failOpen) {
        logger.warn('Identity service unavailable, allowing technician (fail-open)', {
          technicianId,
          error: message,
          circuit: this.breaker.getState()
        });
        return;
      }
      logger.error('Identity service unavailable, rejecting technician (fail-closed)', {
        technicianId,
        error: message,
        circuit: this.breaker.getState()
      });
      throw new TechnicianNotFoundError(technicianId, UNAVAILABLE_REASON);
    }

    if (!info) {
      throw new TechnicianNotFoundError(technicianId, 'not found');
    }
    if (info.status !== DIRECTORY_ACTIVE_STATUS) {
      throw new TechnicianNotFoundError(technicianId, 'is not active');
    }
    if (info.role !== DIRECTORY_TECHNICIAN_ROLE) {
      throw new TechnicianNotFoundError(technicianId, 'is not a technician');
    }

    logger.debug('Technician validated', { technicianId });
  }

  async getInfo(technicianId: number): Promise<TechnicianInfo | null> {
    if (!this.settings.enabled) return null;

    try {
      return await this.lookup(technicianId);
    } catch (error) {
      logger.warn('Technician info lookup failed', {
        technicianId,
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }

  /**
   * null on 404, throws on anything that is not a usable answer
   */
  private lookup(technicianId: number): Promise<TechnicianInfo | null> {
    const url = `${this.settings.baseUrl.replace(/\/+$/, '')}/api/users/${technicianId}`;

    return this.breaker.execute(async () => {
      const response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.settings.timeoutMs)
      });

      if (response.status === 404) return null;
      if (!response.ok) {
        throw new DirectoryUnavailableError(`Identity service responded ${response.status}`);
      }

      const body: unknown = await response.json();
      const parsed = technicianInfoSchema.safeParse(body);
      if (!parsed.success) {
        throw new DirectoryUnavailableError('Identity service returned a malformed user');
      }
      return parsed.data;
    });
  }
}

export function createTechnicianDirectory(): TechnicianDirectoryService {
  return new TechnicianDirectoryService({
    enabled: config.identity.validationEnabled,
    failOpen: config.identity.failOpen,
    baseUrl: config.identity.baseUrl,
    timeoutMs: config.identity.timeoutMs
  });
}
