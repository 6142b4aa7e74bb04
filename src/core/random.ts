import { HASH_CONSTANTS } from './defaults'

// ============================================================
// 決定性乱数
// ============================================================

/**
 * xorshift64 PRNG（決定性乱数生成）
 */
export class Xorshift64 {
  private state: bigint

  constructor(seed: bigint) {
    this.state = seed === 0n ? 1n : seed
  }

  /** [0, 1) の乱数 */
  next(): number {
    let x = this.state || 1n
    x ^= x << 13n
    x ^= x >> 7n
    x ^= x << 17n
    this.state = x & 0xffffffffffffffffn
    // Guard: ensure state doesn't become 0 after operations
    if (this.state === 0n) this.state = 1n
    const result = Number(this.state & 0xffffffffn) / HASH_CONSTANTS.prngDivisor
    return Math.max(0, Math.min(1, result))
  }

  /** [0, max) の整数 */
  nextInt(max: number): number {
    if (max <= 1) return 0
    return Math.min(max - 1, Math.floor(this.next() * max))
  }
}

/**
 * 文字列をシードに変換（FNV-1a ハッシュ）
 */
export function hashToSeed(input: string): bigint {
  let hash: bigint = HASH_CONSTANTS.fnv1aOffsetBasis
  for (let i = 0; i < input.length; i++) {
    hash ^= BigInt(input.charCodeAt(i))
    hash = (hash * HASH_CONSTANTS.fnv1aPrime) & HASH_CONSTANTS.fnv1aBitMask
  }
  return hash
}

/**
 * シード付き Fisher-Yates シャッフル
 *
 * 入力は変更せず、新しい配列を返す。同じシードなら同じ順序。
 */
export function seededShuffle<T>(items: readonly T[], seed: string): T[] {
  const rng = new Xorshift64(hashToSeed(seed))
  const result = [...items]
  for (let i = result.length - 1; i > 0; i--) {
    const j = rng.nextInt(i + 1)
    const tmp = result[i]
    result[i] = result[j]
    result[j] = tmp
  }
  return result
}
