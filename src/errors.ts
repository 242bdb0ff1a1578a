/** No hosted zone matches the requested name and privacy flag */
export class ZoneNotFoundError extends Error {
  readonly zone: string;
  readonly isPrivate: boolean;

  constructor(zone: string, isPrivate: boolean) {
    super(`Hosted zone "${zone}" with private=${isPrivate} not found`);
    this.name = 'ZoneNotFoundError';
    this.zone = zone;
    this.isPrivate = isPrivate;
  }
}

/** Invalid CLI or environment configuration */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
