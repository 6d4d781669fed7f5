/**
 * CredentialVault — scoped access to upload credentials.
 *
 * Holds a frozen snapshot of the credential values taken when the run
 * starts. An upload borrows one credential for the duration of a single
 * call and receives it as a child-process environment overlay; the lease is
 * released when the call settles, whether it succeeded or not.
 */

import type { GateConfig } from '../core/types.js';
import type { CredentialKind } from './types.js';
import { PublishError } from '../core/errors.js';

export interface CredentialLease {
  kind: CredentialKind;
  /** Environment overlay to pass to exactly one child process */
  env: Readonly<Record<string, string>>;
}

export class CredentialVault {
  private readonly values: Readonly<Record<CredentialKind, string>>;
  private readonly tokenVariable: string;
  private active: CredentialKind | null = null;

  constructor(values: Record<CredentialKind, string>, tokenVariable: string) {
    this.values = Object.freeze({ ...values });
    this.tokenVariable = tokenVariable;
  }

  static fromEnv(config: GateConfig, env: NodeJS.ProcessEnv = process.env): CredentialVault {
    return new CredentialVault(
      {
        dev: env[config.publish.credentials.dev] ?? '',
        tag: env[config.publish.credentials.tag] ?? '',
      },
      config.publish.tokenVariable,
    );
  }

  has(kind: CredentialKind): boolean {
    return this.values[kind] !== '';
  }

  /** The credential currently lent out, if any */
  getActive(): CredentialKind | null {
    return this.active;
  }

  async withCredential<T>(kind: CredentialKind, fn: (lease: CredentialLease) => Promise<T>): Promise<T> {
    if (this.active) {
      throw new PublishError(`Credential "${this.active}" is already in use`, `${kind}-release`);
    }
    if (!this.has(kind)) {
      throw new PublishError(`No ${kind} upload credential is configured`, `${kind}-release`);
    }

    this.active = kind;
    try {
      return await fn({ kind, env: Object.freeze({ [this.tokenVariable]: this.values[kind] }) });
    } finally {
      this.active = null;
    }
  }
}
