/**
 * Encoding Collection
 *
 * An ordered vector of episode encodings sharing one width, read through a
 * `CodeStore` so that dense arrays and sparse single-column matrices are
 * interchangeable. Cross-episode operations (dimension mapping, pairwise
 * interaction search) are built only from `EpisodeEncoding` primitives.
 */

import type { IntersectionResult, WeightsMatrix } from '../schemas/episodeEncoding';
import { appLogger } from './appLogger';
import {
  EncodingValidationError,
  IncompatibleSizeError,
  IndexOutOfRangeError,
} from './encodingErrors';
import { EpisodeEncoding } from './episodeEncoding';

// ============================================================================
// STORAGE BACKENDS
// ============================================================================

export interface CodeStore {
  elementCount(): number;
  valueAt(index: number): bigint | number;
}

export class DenseCodeStore implements CodeStore {
  constructor(private readonly codes: ReadonlyArray<bigint | number>) {}

  elementCount(): number {
    return this.codes.length;
  }

  valueAt(index: number): bigint | number {
    return this.codes[index] ?? 0;
  }
}

/**
 * Single-column compressed sparse column matrix: only non-zero rows are
 * stored, every other row reads as 0.
 */
export interface SparseColumn {
  readonly rowCount: number;
  readonly rowIndices: ReadonlyArray<number>;
  readonly values: ReadonlyArray<bigint | number>;
}

export class SparseCodeStore implements CodeStore {
  private readonly rowCount: number;
  private readonly entries = new Map<number, bigint | number>();

  constructor(column: SparseColumn) {
    if (column.rowIndices.length !== column.values.length) {
      throw new IncompatibleSizeError({
        leftSize: column.rowIndices.length,
        rightSize: column.values.length,
        context: 'sparse column (row indices vs values)',
      });
    }
    column.rowIndices.forEach((row, k) => {
      if (!Number.isInteger(row) || row < 0 || row >= column.rowCount) {
        throw new IndexOutOfRangeError({ index: row, size: column.rowCount });
      }
      const value = column.values[k];
      if (value !== undefined) {
        this.entries.set(row, value);
      }
    });
    this.rowCount = column.rowCount;
  }

  elementCount(): number {
    return this.rowCount;
  }

  valueAt(index: number): bigint | number {
    const value = this.entries.get(index) ?? 0;
    // numeric matrices may hold floats; codes are read as integers
    return typeof value === 'number' ? Math.trunc(value) : value;
  }
}

// ============================================================================
// COLLECTION
// ============================================================================

export interface IntersectionLabels {
  readonly labelsSelf?: ReadonlyArray<string>;
  readonly labelsOther?: ReadonlyArray<string>;
}

const weightToBigInt = (weight: number | bigint, target: number, source: number): bigint => {
  if (typeof weight === 'bigint') return weight;
  if (!Number.isFinite(weight)) {
    throw new EncodingValidationError({
      field: `weights[${target}][${source}]`,
      issue: `expected a finite number, got ${weight}`,
    });
  }
  return BigInt(Math.trunc(weight));
};

export class EncodingCollection {
  constructor(
    private readonly store: CodeStore,
    readonly width: number = 32
  ) {}

  static dense(codes: ReadonlyArray<bigint | number>, width: number = 32): EncodingCollection {
    return new EncodingCollection(new DenseCodeStore(codes), width);
  }

  static sparse(column: SparseColumn, width: number = 32): EncodingCollection {
    return new EncodingCollection(new SparseCodeStore(column), width);
  }

  elementCount(): number {
    return this.store.elementCount();
  }

  encodingAt(index: number): EpisodeEncoding {
    const size = this.elementCount();
    if (!Number.isInteger(index) || index < 0 || index >= size) {
      throw new IndexOutOfRangeError({ index, size });
    }
    return new EpisodeEncoding(this.store.valueAt(index), this.width);
  }

  codingList(): bigint[] {
    const codes: bigint[] = [];
    for (let i = 0; i < this.elementCount(); i++) {
      codes.push(this.encodingAt(i).value);
    }
    return codes;
  }

  /**
   * Map the collection onto a new set of dimensions.
   *
   * `weights[i][j]` scales source encoding `j` into target `i`; output `i` is
   * the OR of every scaled source. Only {0, 1} weights keep the result a
   * clean bitwise union; other integers multiply the raw value first.
   */
  transform(weights: WeightsMatrix): EpisodeEncoding[] {
    if (weights.length === 0) return [];

    const sourceCount = this.elementCount();
    const width = this.encodingAt(0).width;
    const sources = Array.from({ length: sourceCount }, (_, j) => this.encodingAt(j));

    const mapped = weights.map((row, i) => {
      if (row.length !== sourceCount) {
        throw new IncompatibleSizeError({
          leftSize: row.length,
          rightSize: sourceCount,
          context: `weights row ${i}`,
        });
      }
      let merged = 0n;
      sources.forEach((source, j) => {
        merged |= source.value * weightToBigInt(row[j] ?? 0, i, j);
      });
      return new EpisodeEncoding(merged, width);
    });

    appLogger.debug('encoding_transform_complete', {
      sourceCount,
      targetCount: mapped.length,
      bits: mapped.map((e) => e.toBitString()),
    });

    return mapped;
  }

  /**
   * Pairwise interaction between element i of this collection and every
   * element j > i of `other`. Only non-zero interactions are kept, keyed
   * "labelSelf - labelOther" when both label lists are given, else "i j".
   */
  intersection(
    other: EncodingCollection,
    extraBits: number,
    labels: IntersectionLabels = {}
  ): IntersectionResult {
    const size = this.elementCount();
    if (size !== other.elementCount()) {
      throw new IncompatibleSizeError({
        leftSize: size,
        rightSize: other.elementCount(),
        context: 'intersection',
      });
    }

    const { labelsSelf, labelsOther } = labels;
    const keyLabels =
      labelsSelf !== undefined && labelsOther !== undefined
        ? { self: labelsSelf, other: labelsOther }
        : undefined;
    if (keyLabels) {
      for (const list of [keyLabels.self, keyLabels.other]) {
        if (list.length !== size) {
          throw new IncompatibleSizeError({ leftSize: list.length, rightSize: size, context: 'intersection labels' });
        }
      }
    }

    const codings = new Map<string, bigint>();
    const keys = new Set<string>();
    for (let i = 0; i < size; i++) {
      const left = this.encodingAt(i);
      for (let j = i + 1; j < size; j++) {
        const overlap = EpisodeEncoding.interaction(left, other.encodingAt(j), extraBits);
        if (overlap.value === 0n) continue;

        const key = keyLabels ? `${keyLabels.self[i]} - ${keyLabels.other[j]}` : `${i} ${j}`;
        keys.add(key);
        codings.set(key, overlap.value);
      }
    }
    return { codings, keys };
  }
}
