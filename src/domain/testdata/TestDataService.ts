/*
 * MIT License
 * Copyright (c) 2024
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { Logger } from '../../logging/logger';
import { toError } from '../../lifecycle/errors';
import { TenantInput, TenantRepository } from '../tenants/TenantRepository';

export type SeedResult =
  | { ok: true; created: number; skipped: number }
  | { ok: false; error: Error };

interface TestDataFile {
  tenants: TenantInput[];
}

const isTenantInput = (value: unknown): value is TenantInput => {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  if (!('name' in value) || typeof value.name !== 'string') {
    return false;
  }
  return !('description' in value) || value.description === undefined || typeof value.description === 'string';
};

const parseTestData = (raw: string): TestDataFile => {
  const parsed: unknown = JSON.parse(raw);
  const entries = typeof parsed === 'object' && parsed !== null && 'tenants' in parsed ? parsed.tenants : undefined;
  if (!Array.isArray(entries)) {
    throw new Error('Test data must be an object with a "tenants" array');
  }

  const tenants: unknown[] = entries;
  const invalid = tenants.findIndex((entry) => !isTenantInput(entry));
  if (invalid !== -1) {
    throw new Error(`Invalid tenant entry at index ${invalid}`);
  }

  return { tenants: tenants.filter(isTenantInput) };
};

/**
 * Seeds fixture tenants for local development. Never throws: failures come
 * back as `{ ok: false }` for the caller to log.
 */
export class TestDataService {
  constructor(
    private readonly tenants: TenantRepository,
    private readonly logger: Logger,
    private readonly file: string,
  ) {}

  async initializeTestData(): Promise<SeedResult> {
    try {
      const raw = await readFile(resolve(process.cwd(), this.file), 'utf8');
      const data = parseTestData(raw);

      let created = 0;
      let skipped = 0;
      for (const input of data.tenants) {
        if (this.tenants.findByName(input.name.trim())) {
          skipped += 1;
          continue;
        }
        this.tenants.create(input);
        created += 1;
      }

      this.logger.info('Test data initialized', { file: this.file, created, skipped });
      return { ok: true, created, skipped };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }
}
