/**
 * Prompt Pool
 *
 * Shared source of PromptRecords for one LevelRun. Workers pull records
 * through a synchronous cursor, so two workers never receive the same
 * record from a single take().
 */

import { randomUUID } from 'node:crypto';
import type { PromptExhaustionPolicy, PromptRecord } from '../types/index.js';

/**
 * Produces prompt records of a target token length
 */
export interface PromptSource {
  generate(count: number, targetTokens: number): PromptRecord[];
}

/**
 * Default generator: a fresh UUID in front of a fixed base prompt, which
 * keeps identical prompts out of any server-side prefix cache.
 */
export class UuidPromptGenerator implements PromptSource {
  constructor(private readonly basePrompt: string) {}

  public generate(count: number, targetTokens: number): PromptRecord[] {
    const records: PromptRecord[] = [];
    for (let i = 0; i < count; i++) {
      const id = randomUUID();
      records.push(Object.freeze({ id, text: `${id} ${this.basePrompt}`, targetTokens }));
    }
    return records;
  }
}

export interface PromptPoolOptions {
  source: PromptSource;
  size: number;
  targetTokens: number;
  exhaustionPolicy: PromptExhaustionPolicy;
}

export class PromptPool {
  private records: PromptRecord[];
  private cursor = 0;
  private taken = 0;
  private readonly options: PromptPoolOptions;

  constructor(options: PromptPoolOptions) {
    if (options.size < 1) {
      throw new Error('Prompt pool size must be >= 1');
    }
    this.options = options;
    this.records = options.source.generate(options.size, options.targetTokens);
    if (this.records.length === 0) {
      throw new Error('Prompt source produced no records');
    }
  }

  /**
   * Next record. On exhaustion either wraps around (cycle) or asks the
   * source for another batch (replenish).
   */
  public take(): PromptRecord {
    if (this.cursor >= this.records.length) {
      if (this.options.exhaustionPolicy === 'replenish') {
        const batch = this.options.source.generate(this.options.size, this.options.targetTokens);
        if (batch.length === 0) {
          throw new Error('Prompt source produced no records');
        }
        this.records = this.records.concat(batch);
      } else {
        this.cursor = 0;
      }
    }

    const record = this.records[this.cursor];
    if (record === undefined) {
      throw new Error(`Prompt pool cursor out of range: ${this.cursor}`);
    }
    this.cursor++;
    this.taken++;
    return record;
  }

  /** Records handed out so far */
  public get consumed(): number {
    return this.taken;
  }

  public get size(): number {
    return this.records.length;
  }
}
