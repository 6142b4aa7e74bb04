/**
 * エラー分類
 *
 * どちらも呼び出し側の設定ミス。コアはリトライしない。
 * それ以外の境界条件（空プール、予算0、満たせないギャップ制約など）は
 * エラーにせず、注入数を減らして返す。
 */

export type BlendErrorCode = 'INVALID_WEIGHT_CONFIG' | 'UNKNOWN_STRATEGY' | 'INVALID_CONFIG'

export class BlendError extends Error {
  readonly code: BlendErrorCode

  constructor(code: BlendErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/** 負の重みが渡された */
export class InvalidWeightConfigError extends BlendError {
  constructor(readonly field: string, readonly value: number) {
    super('INVALID_WEIGHT_CONFIG', `Weight "${field}" must be non-negative (got ${value})`)
  }
}

/** 未知の戦略タイプ */
export class UnknownStrategyError extends BlendError {
  constructor(readonly strategyType: string) {
    super('UNKNOWN_STRATEGY', `Unknown injection strategy: "${strategyType}"`)
  }
}

/** 環境設定の値が不正 */
export class ConfigError extends BlendError {
  constructor(readonly keys: string[]) {
    super('INVALID_CONFIG', `Invalid configuration: ${keys.join(', ')}`)
  }
}

export function isBlendError(error: unknown): error is BlendError {
  return error instanceof BlendError
}
