/**
 * Master Key Provisioner
 *
 * Turns out-of-authority keys into `proposed` registry records and activates
 * them when a run is auto-approved. Deduplication is checked against the whole
 * registry, not just the current run.
 */

import { DEFAULT_PROVISIONING_CONFIG, type ProvisioningConfig } from '../core/config.js';
import { toError } from '../core/errors.js';
import {
  isProvisioningStrategy,
  PROVISIONING_STRATEGIES,
  type MasterKeyStatus,
  type ProvisioningStrategy,
  type SourceKeyRef,
} from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { RunStateStore } from '../persistence/run-state-store.js';

const log = createLogger({ module: 'provisioner' });

/**
 * Picks the provisioning source among the (system, raw key) pairs a
 * normalized key was seen under. Receives a non-empty list.
 */
export type SourceSelector = (sources: readonly SourceKeyRef[], normalizedKey: string) => SourceKeyRef;

export const selectFirstSource: SourceSelector = (sources) => {
  const [first] = sources;
  if (first === undefined) {
    throw new RangeError('selectSource called with no sources');
  }
  return first;
};

export interface ProposedMasterKey {
  readonly masterKeyId: number;
  readonly masterKey: string;
  readonly normalizedKey: string;
  readonly sourceSystem: string;
  readonly sourceKey: string;
  /** Every system the key was seen in, deduplicated, in source order */
  readonly affectedSystems: readonly string[];
  readonly strategy: ProvisioningStrategy;
  readonly status: Extract<MasterKeyStatus, 'proposed'>;
}

export interface ProvisioningStatistics {
  readonly keysProposed: number;
  readonly keysActivated: number;
  readonly keysSkipped: number;
  readonly keysFailed: number;
  /** Effective strategy -> master keys generated with it */
  readonly strategyUsed: Readonly<Record<string, number>>;
}

export interface ProvisioningSummary {
  readonly runId: number;
  readonly totalProposed: number;
  readonly totalActivated: number;
  readonly strategy: ProvisioningStrategy;
  readonly autoApprove: boolean;
  readonly stats: ProvisioningStatistics;
}

export interface MasterKeyProvisionerOptions {
  readonly config?: Partial<ProvisioningConfig>;
  readonly selectSource?: SourceSelector;
}

interface MutableStatistics {
  keysProposed: number;
  keysActivated: number;
  keysSkipped: number;
  keysFailed: number;
  strategyUsed: Record<string, number>;
}

function emptyStatistics(): MutableStatistics {
  return { keysProposed: 0, keysActivated: 0, keysSkipped: 0, keysFailed: 0, strategyUsed: {} };
}

export class MasterKeyProvisioner {
  private readonly config: ProvisioningConfig;
  private readonly strategy: ProvisioningStrategy;
  private readonly selectSource: SourceSelector;
  private stats = emptyStatistics();

  constructor(
    private readonly store: RunStateStore,
    options: MasterKeyProvisionerOptions = {}
  ) {
    this.config = { ...DEFAULT_PROVISIONING_CONFIG, ...options.config };
    this.selectSource = options.selectSource ?? selectFirstSource;

    if (isProvisioningStrategy(this.config.strategy)) {
      this.strategy = this.config.strategy;
    } else {
      log.warn(`Unknown strategy '${this.config.strategy}', using mirror strategy`, {
        supported: PROVISIONING_STRATEGIES,
      });
      this.strategy = 'mirror';
    }
  }

  /**
   * Effective strategy after fallback
   */
  getStrategy(): ProvisioningStrategy {
    return this.strategy;
  }

  generateMasterKey(sourceSystem: string, normalizedKey: string): string {
    switch (this.strategy) {
      case 'mirror':
        return normalizedKey;
      case 'namespaced':
        return `${this.config.namespacePrefix}-${sourceSystem}-${normalizedKey}`;
    }
  }

  /**
   * Propose master keys for out-of-authority keys
   *
   * @param outOfAuthority - normalized key -> (system, raw key) pairs it was seen under
   * @returns Records created by this call, in input order
   */
  async propose(
    runId: number,
    outOfAuthority: ReadonlyMap<string, readonly SourceKeyRef[]>
  ): Promise<ProposedMasterKey[]> {
    const proposed: ProposedMasterKey[] = [];

    for (const [normalizedKey, sources] of outOfAuthority) {
      if (sources.length === 0) {
        log.debug(`No sources for '${normalizedKey}', skipping`);
        continue;
      }

      const source = this.selectSource(sources, normalizedKey);
      const masterKey = this.generateMasterKey(source.system, normalizedKey);

      const existing = await this.store.findLiveMasterKey(normalizedKey, masterKey);
      if (existing) {
        log.info(`Master key already exists for '${normalizedKey}', skipping`, {
          masterKey: existing.masterKey,
          status: existing.status,
        });
        this.stats.keysSkipped++;
        continue;
      }

      try {
        const masterKeyId = await this.store.proposeMasterKey({
          runId,
          masterKey,
          normalizedKey,
          sourceSystem: source.system,
          sourceKey: source.rawKey,
          strategy: this.strategy,
        });

        proposed.push({
          masterKeyId,
          masterKey,
          normalizedKey,
          sourceSystem: source.system,
          sourceKey: source.rawKey,
          affectedSystems: [...new Set(sources.map((s) => s.system))],
          strategy: this.strategy,
          status: 'proposed',
        });

        this.stats.keysProposed++;
        this.stats.strategyUsed[this.strategy] = (this.stats.strategyUsed[this.strategy] ?? 0) + 1;
        log.info(`Proposed master key '${masterKey}' for normalized key '${normalizedKey}'`);
      } catch (error) {
        this.stats.keysFailed++;
        log.error(`Failed to propose master key for '${normalizedKey}'`, {
          masterKey,
          error: toError(error).message,
        });
      }
    }

    return proposed;
  }

  /**
   * Activate the run's proposed keys when auto-approve is on
   *
   * @param autoApprove - Overrides the configured setting
   * @returns Number of keys activated (0 when auto-approve is off)
   */
  async activate(runId: number, autoApprove?: boolean): Promise<number> {
    if (!(autoApprove ?? this.config.autoApprove)) {
      log.info('Auto-approve is disabled, keys remain in proposed state');
      return 0;
    }

    const activated = await this.store.activateMasterKeys(runId);
    this.stats.keysActivated += activated;
    log.info(`Activated ${activated} master keys from run ${runId}`);
    return activated;
  }

  async getProvisioningSummary(runId: number): Promise<ProvisioningSummary> {
    const records = await this.store.getMasterKeysForRun(runId);
    return {
      runId,
      totalProposed: records.filter((record) => record.status === 'proposed').length,
      totalActivated: records.filter((record) => record.status === 'active').length,
      strategy: this.strategy,
      autoApprove: this.config.autoApprove,
      stats: this.getStatistics(),
    };
  }

  getStatistics(): ProvisioningStatistics {
    return { ...this.stats, strategyUsed: { ...this.stats.strategyUsed } };
  }

  resetStatistics(): void {
    this.stats = emptyStatistics();
  }
}
