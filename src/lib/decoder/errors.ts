export interface ConfigViolation {
  path: string
  message: string
}

export class ConfigError extends Error {
  readonly violations: readonly ConfigViolation[]

  constructor(violations: ConfigViolation[]) {
    super(
      `Invalid packet configuration (${violations.length} ${violations.length === 1 ? 'problem' : 'problems'}):\n`
      + violations.map((v) => `  ${v.path}: ${v.message}`).join('\n'),
    )
    this.name = 'ConfigError'
    this.violations = Object.freeze([...violations])
  }
}
