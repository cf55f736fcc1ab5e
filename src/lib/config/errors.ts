/**
 * The configuration does not match the schema. Lists every issue.
 */
export class ConfigValidationError extends Error {
  public errPrefix = 'ConfigErr';
  public errType = 'Config';
  public errCode = 'Invalid';
  public additionalInfo: { issues: string[]; filePath?: string };

  constructor(issues: string[], filePath?: string) {
    const source = filePath ? ` in ${filePath}` : '';
    super(
      `Invalid configuration${source}:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`,
    );
    this.name = 'ConfigValidationError';
    this.additionalInfo = { issues, filePath };
  }
}

/**
 * The configuration file could not be read or is not JSON
 */
export class ConfigLoadError extends Error {
  public errPrefix = 'ConfigErr';
  public errType = 'Config';
  public errCode: 'NotFound' | 'Unreadable' | 'InvalidJSON';
  public additionalInfo: { filePath: string };
  public cause?: unknown;

  constructor(
    message: string,
    errCode: 'NotFound' | 'Unreadable' | 'InvalidJSON',
    filePath: string,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
    this.errCode = errCode;
    this.additionalInfo = { filePath };
    this.cause = cause;
  }
}
