/**
 * Deployer — carries out the publish actions chosen by the gate.
 *
 * Each action runs at most once per deployer and gets a single attempt.
 * A failing action is reported and does not stop the remaining ones.
 */

import { EventEmitter } from 'node:events';
import type {
  DocsPublishAction,
  PublishAction,
  PublishKind,
  PublishResult,
  PublishSkip,
  PublishTarget,
  UploadAction,
} from './types.js';
import { GateError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { Timer } from '../utils/timer.js';

export interface DeployerTargets {
  docs: PublishTarget<DocsPublishAction>;
  upload: PublishTarget<UploadAction>;
}

export class Deployer extends EventEmitter {
  private targets: DeployerTargets;
  private executed: Set<PublishKind> = new Set();
  private logger = getLogger();

  constructor(targets: DeployerTargets) {
    super();
    this.targets = targets;
  }

  /**
   * Log the rules that did not fire. Skips are informational only.
   */
  reportSkipped(skipped: PublishSkip[]): void {
    for (const skip of skipped) {
      this.logger.info({ action: skip.kind, reason: skip.reason }, 'Publish skipped');
      this.emit('deploy:skipped', { timestamp: Date.now(), ...skip });
    }
  }

  async deployAll(actions: PublishAction[]): Promise<PublishResult[]> {
    const results: PublishResult[] = [];
    for (const action of actions) {
      const result = await this.deploy(action);
      if (result) {
        results.push(result);
      }
    }
    return results;
  }

  /**
   * Returns null when the same kind of action already ran.
   */
  async deploy(action: PublishAction): Promise<PublishResult | null> {
    if (this.executed.has(action.kind)) {
      this.logger.warn({ action: action.kind }, 'Publish action already executed, ignoring');
      return null;
    }
    this.executed.add(action.kind);

    const timer = new Timer();
    this.logger.info({ action: action.kind }, 'Publishing');
    this.emit('deploy:start', { timestamp: Date.now(), kind: action.kind });

    try {
      const logs = await this.dispatch(action);
      const duration = timer.stop();

      this.logger.info({ action: action.kind, durationMs: Math.round(duration) }, 'Publish complete');
      this.emit('deploy:complete', { timestamp: Date.now(), kind: action.kind });

      return { kind: action.kind, status: 'success', logs, duration };
    } catch (err) {
      const duration = timer.stop();
      const message = err instanceof Error ? err.message : String(err);
      const code = err instanceof GateError ? err.code : 'PUBLISH_FAILURE';

      this.logger.error({ action: action.kind, code, error: message }, 'Publish failed');
      this.emit('deploy:failed', { timestamp: Date.now(), kind: action.kind, error: message });

      return {
        kind: action.kind,
        status: 'failed',
        logs: [`Publish failed: ${message}`],
        duration,
        error: message,
      };
    }
  }

  hasExecuted(kind: PublishKind): boolean {
    return this.executed.has(kind);
  }

  private dispatch(action: PublishAction): Promise<string[]> {
    switch (action.kind) {
      case 'docs':
        return this.targets.docs.publish(action);
      case 'tag-release':
      case 'dev-release':
        return this.targets.upload.publish(action);
    }
  }
}
