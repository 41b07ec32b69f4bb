/**
 * Deterministic variant selection with repetition control.
 *
 * Per key, recently chosen indices are skipped; any option too similar to
 * the last emitted response is skipped too. Response families (a rule, a
 * fallback pool, recall) cool down over a short window.
 */

import { bigramSimilarity, REPEAT_SIMILARITY_THRESHOLD } from '../utils/text-similarity.js';
import { DEFAULT_HISTORY_CAPACITY, lastN, pushBounded } from '../utils/bounded.js';

export interface VariantControllerOptions {
  /** Recent indices per key that are skipped (default 6) */
  variantCooldown?: number;
  /** Family records that block reuse of a family (default 4) */
  familyCooldownWindow?: number;
  similarityThreshold?: number;
  /** Capacity of every history FIFO (default 16) */
  capacity?: number;
}

export interface VariantPick {
  index: number;
  text: string;
}

export interface VariantControllerState {
  usedVariantIndices: Record<string, number[]>;
  recentResponseHistory: string[];
  recentFamilyHistory: string[];
}

export class VariantController {
  private usedVariantIndices = new Map<string, number[]>();
  private recentResponseHistory: string[] = [];
  private recentFamilyHistory: string[] = [];

  private variantCooldown: number;
  private familyCooldownWindow: number;
  private similarityThreshold: number;
  private capacity: number;

  constructor(options: VariantControllerOptions = {}) {
    this.variantCooldown = options.variantCooldown ?? 6;
    this.familyCooldownWindow = options.familyCooldownWindow ?? 4;
    this.similarityThreshold = options.similarityThreshold ?? REPEAT_SIMILARITY_THRESHOLD;
    this.capacity = options.capacity ?? DEFAULT_HISTORY_CAPACITY;
  }

  /**
   * Choose without recording. Returns undefined only for an empty list.
   * @param eligible - restricts the candidates; the fallback is the first eligible index
   */
  peek(options: readonly string[], key: string, eligible?: (index: number) => boolean): VariantPick | undefined {
    if (options.length === 0) return undefined;

    const recent = lastN(this.usedVariantIndices.get(key) ?? [], this.variantCooldown);
    const lastResponse = this.recentResponseHistory[this.recentResponseHistory.length - 1];

    let fallback: number | undefined;
    for (let index = 0; index < options.length; index++) {
      if (eligible && !eligible(index)) continue;
      fallback ??= index;

      const text = options[index];
      if (text === undefined || recent.includes(index)) continue;
      if (lastResponse !== undefined && bigramSimilarity(text, lastResponse) >= this.similarityThreshold) continue;

      return { index, text };
    }

    const index = fallback ?? 0;
    return { index, text: options[index] ?? '' };
  }

  /**
   * Record a choice: the index under its key, the emitted text globally.
   */
  commit(key: string, index: number, text: string): void {
    let indices = this.usedVariantIndices.get(key);
    if (!indices) {
      indices = [];
      this.usedVariantIndices.set(key, indices);
    }
    pushBounded(indices, index, this.capacity);
    pushBounded(this.recentResponseHistory, text, this.capacity);
  }

  /** peek + commit */
  chooseVariant(options: readonly string[], key: string, eligible?: (index: number) => boolean): string | undefined {
    const pick = this.peek(options, key, eligible);
    if (!pick) return undefined;
    this.commit(key, pick.index, pick.text);
    return pick.text;
  }

  canUseFamily(familyKey: string): boolean {
    return !lastN(this.recentFamilyHistory, this.familyCooldownWindow).includes(familyKey);
  }

  recordFamilyUse(familyKey: string): void {
    pushBounded(this.recentFamilyHistory, familyKey, this.capacity);
  }

  snapshot(): VariantControllerState {
    const usedVariantIndices: Record<string, number[]> = {};
    for (const [key, indices] of this.usedVariantIndices) {
      usedVariantIndices[key] = [...indices];
    }
    return {
      usedVariantIndices,
      recentResponseHistory: [...this.recentResponseHistory],
      recentFamilyHistory: [...this.recentFamilyHistory],
    };
  }

  reset(): void {
    this.usedVariantIndices.clear();
    this.recentResponseHistory = [];
    this.recentFamilyHistory = [];
  }
}
