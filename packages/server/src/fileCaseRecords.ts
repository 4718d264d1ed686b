import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { formatError } from '@entra-bearer/core';
import type { CaseRecords } from '@entra-bearer/hono';
import { type Logger, pino } from 'pino';
import * as z from 'zod';

/** `processes.json`: protocol identifier to process number */
const ProcessIndexSchema = z.record(z.string(), z.string().min(1));

/**
 * Case records read from a data directory holding `processes.json` and the
 * pre-extracted `process.txt`. Files are read on every call.
 */
export class FileCaseRecords implements CaseRecords {
  private logger: Logger;

  constructor(
    private dataDir: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? pino({ enabled: false });
  }

  async findProcessNumber(protocol: string): Promise<string | undefined> {
    const index = await this.loadIndex();
    return Object.hasOwn(index, protocol) ? index[protocol] : undefined;
  }

  async getProcessText(): Promise<string> {
    return readFile(join(this.dataDir, 'process.txt'), 'utf8');
  }

  private async loadIndex(): Promise<Record<string, string>> {
    const file = join(this.dataDir, 'processes.json');
    const raw = await readFile(file, 'utf8');

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(`${file} is not valid JSON: ${formatError(error)}`, { cause: error });
    }

    const result = ProcessIndexSchema.safeParse(parsed);
    if (!result.success) {
      this.logger.error({ file, issues: result.error.issues }, 'invalid process index');
      throw new Error(`${file} must map protocol identifiers to process numbers`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}
