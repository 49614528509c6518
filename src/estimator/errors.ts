/**
 * Raised when the estimator cannot run at all because its cost model is
 * missing or unreadable. Data quality problems in order lines never raise.
 */
export class ConfigurationError extends Error {
  readonly settingKey?: string;

  constructor(message: string, settingKey?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.settingKey = settingKey;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
