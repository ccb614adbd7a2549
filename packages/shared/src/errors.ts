export type ModelErrorCode =
  | 'CONSTRUCTION'
  | 'CONSISTENCY'
  | 'NUMERIC_ASSUMPTION'
  | 'SINGULAR_TRANSFORM'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_ARGUMENT'

export type ErrorEnvelope = {
  error: {
    code: ModelErrorCode | 'UNKNOWN'
    message: string
    details?: Record<string, unknown>
  }
}

/** データモデル層で送出するエラーの基底クラス。 */
export class ModelError extends Error {
  readonly code: ModelErrorCode
  readonly envelope: ErrorEnvelope

  constructor(
    code: ModelErrorCode,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'ModelError'
    this.code = code
    this.envelope = {
      error: {
        code,
        message,
        details,
      },
    }
  }
}

/** 不正な入力から構造体を組み立てようとしたときのエラー。 */
export class ConstructionError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONSTRUCTION', message, details)
    this.name = 'ConstructionError'
  }
}

/** 2 つのデータの基底・形状・件数が噛み合わないときのエラー。 */
export class ConsistencyError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONSISTENCY', message, details)
    this.name = 'ConsistencyError'
  }
}

/** 数値データが前提（占有数の規約など）を満たさないときのエラー。 */
export class NumericAssumptionError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('NUMERIC_ASSUMPTION', message, details)
    this.name = 'NumericAssumptionError'
  }
}

/** 行列式 0 のスーパーセル変換行列。 */
export class SingularTransformError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SINGULAR_TRANSFORM', message, details)
    this.name = 'SingularTransformError'
  }
}

export class IndexRangeError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INDEX_OUT_OF_RANGE', message, details)
    this.name = 'IndexRangeError'
  }
}

export class InvalidArgumentError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_ARGUMENT', message, details)
    this.name = 'InvalidArgumentError'
  }
}

export const isModelError = (value: unknown): value is ModelError =>
  value instanceof ModelError

/** 任意の送出値をエラーエンベロープへ変換する。 */
export const toErrorEnvelope = (error: unknown): ErrorEnvelope => {
  if (isModelError(error)) {
    return error.envelope
  }
  if (error instanceof Error) {
    return { error: { code: 'UNKNOWN', message: error.message } }
  }
  return { error: { code: 'UNKNOWN', message: String(error) } }
}
