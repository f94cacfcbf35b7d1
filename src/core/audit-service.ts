/**
 * Audit Service - Identity Events with Null Object Pattern
 *
 * Write-only sink for issuance, validation, rotation and role-check events.
 * Disabled unless configured, so the pipeline behaves the same with or
 * without a collector behind it.
 */

import type { AuditEntry } from './types.js';

// ============================================================================
// Interfaces
// ============================================================================

/**
 * Configuration for the Audit Service
 */
export interface AuditServiceConfig {
  /** Whether audit logging is enabled (default: false) */
  enabled?: boolean;

  /** Whether to log successful events too, not just failures (default: true) */
  logAllAttempts?: boolean;

  /** Maximum entries kept by the default in-memory storage (default: 10000) */
  maxEntries?: number;

  /** Custom storage implementation (default: InMemoryAuditStorage) */
  storage?: AuditStorage;

  /** Callback invoked when the in-memory storage reaches capacity */
  onOverflow?: (entries: AuditEntry[]) => void;
}

/**
 * Storage interface for audit entries
 *
 * Write-only: there are no query methods. Querying belongs to whatever
 * indexed store sits behind an implementation.
 */
export interface AuditStorage {
  log(entry: AuditEntry): Promise<void> | void;
}

// ============================================================================
// In-Memory Storage Implementation
// ============================================================================

/**
 * Default in-memory audit storage with overflow handling
 */
class InMemoryAuditStorage implements AuditStorage {
  private entries: AuditEntry[] = [];
  private readonly maxEntries: number;
  private onOverflow?: (entries: AuditEntry[]) => void;

  constructor(maxEntries: number = 10000, onOverflow?: (entries: AuditEntry[]) => void) {
    this.maxEntries = maxEntries;
    this.onOverflow = onOverflow;
  }

  log(entry: AuditEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      // Hand over every entry before the oldest one is dropped
      if (this.onOverflow) {
        this.onOverflow([...this.entries]);
      }

      this.entries.shift();
    }
  }

  /**
   * Get all entries (for testing only - not exposed via AuditService)
   * @internal
   */
  getEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * Clear all entries (for testing only)
   * @internal
   */
  clear(): void {
    this.entries = [];
  }
}

// ============================================================================
// Audit Service (Null Object Pattern)
// ============================================================================

/**
 * Centralized audit logging service
 *
 * Usage:
 * ```typescript
 * // Disabled by default
 * const audit = new AuditService();
 * audit.record({ ... }); // No-op
 *
 * // Enabled, forwarding overflow to an external store
 * const audit = new AuditService({
 *   enabled: true,
 *   onOverflow: (entries) => shipper.enqueue(entries),
 * });
 * ```
 */
export class AuditService {
  private enabled: boolean;
  private logAllAttempts: boolean;
  private storage: AuditStorage;

  constructor(config?: AuditServiceConfig) {
    this.enabled = config?.enabled ?? false;
    this.logAllAttempts = config?.logAllAttempts ?? true;

    if (config?.storage) {
      this.storage = config.storage;
    } else {
      this.storage = new InMemoryAuditStorage(config?.maxEntries ?? 10000, config?.onOverflow);
    }
  }

  /**
   * Log an audit entry
   *
   * @throws {Error} If the entry has no source
   */
  async log(entry: AuditEntry): Promise<void> {
    if (!this.enabled) {
      return;
    }

    if (!entry.source) {
      throw new Error('AuditEntry missing required field: source');
    }

    if (entry.success && !this.logAllAttempts) {
      return;
    }

    await this.storage.log(entry);
  }

  /**
   * Best-effort variant of log() for request paths.
   *
   * Never throws and never makes the caller wait on storage; a failing
   * sink is reported on the console and otherwise ignored.
   */
  record(entry: Omit<AuditEntry, 'timestamp'> & { timestamp?: Date }): void {
    if (!this.enabled) {
      return;
    }

    const full: AuditEntry = { ...entry, timestamp: entry.timestamp ?? new Date() };

    this.log(full).catch((error: unknown) => {
      console.warn(
        `[AuditService] Failed to record ${full.action}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    });
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Get internal storage (for testing only)
   * @internal
   */
  _getStorage(): AuditStorage {
    return this.storage;
  }
}

// ============================================================================
// Exports
// ============================================================================

export { InMemoryAuditStorage };
