export type DiagnosticDetails = Record<string, unknown>

/** 致命的でない警告とデバッグ情報の出力先。 */
export type Diagnostics = {
  warn: (message: string, details?: DiagnosticDetails) => void
  debug: (message: string, details?: DiagnosticDetails) => void
}

export type DiagnosticsOptions = {
  diagnostics?: Diagnostics
}

/** `[tag] message` 形式で console に出力する既定の出力先を生成する。 */
export const createConsoleDiagnostics = (tag: string): Diagnostics => ({
  warn(message, details) {
    console.warn(`[${tag}] ${message}`, details ?? {})
  },
  debug(message, details) {
    console.debug(`[${tag}] ${message}`, details ?? {})
  },
})

export const silentDiagnostics: Diagnostics = {
  warn() {},
  debug() {},
}

export const resolveDiagnostics = (
  options: DiagnosticsOptions | undefined,
  tag: string,
): Diagnostics => options?.diagnostics ?? createConsoleDiagnostics(tag)
