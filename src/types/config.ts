export interface SshSettings {
  readonly user: string
  /** Written verbatim into the inventory; `~` is expanded by ansible, not here */
  readonly privateKeyPath: string
  readonly pythonInterpreter: string
}

export interface ReadinessSettings {
  readonly maxAttempts: number
  readonly intervalMs: number
}

export interface VerificationSettings {
  /** Test file relative to testsDir */
  readonly testFile: string
}

/** Project layout and tunables, from envdeploy.config.json merged over defaults. */
export interface ProjectConfig {
  readonly provisioningDir: string
  readonly configurationDir: string
  readonly environmentsDir: string
  readonly testsDir: string
  readonly ssh: SshSettings
  readonly readiness: ReadinessSettings
  readonly verification: VerificationSettings
}

/** Shape of envdeploy.config.json; every key optional. */
export interface ProjectConfigFile {
  readonly provisioningDir?: string
  readonly configurationDir?: string
  readonly environmentsDir?: string
  readonly testsDir?: string
  readonly ssh?: Partial<SshSettings>
  readonly readiness?: Partial<ReadinessSettings>
  readonly verification?: Partial<VerificationSettings>
}
