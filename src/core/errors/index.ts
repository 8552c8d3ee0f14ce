export enum ConfigErrorCode {
  INVALID_JSON = 'INVALID_JSON',
  INVALID_SHAPE = 'INVALID_SHAPE',
}

export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: ConfigErrorCode, suggestion?: string) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.suggestion = suggestion;

    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export enum RegistryErrorCode {
  SKILLS_DIR_NOT_FOUND = 'SKILLS_DIR_NOT_FOUND',
  SKILLS_DIR_NOT_DIRECTORY = 'SKILLS_DIR_NOT_DIRECTORY',
}

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly suggestion?: string;

  constructor(message: string, code: RegistryErrorCode, suggestion?: string) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.suggestion = suggestion;

    Object.setPrototypeOf(this, RegistryError.prototype);
  }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
