import { TimelineError, TimelineErrorOptions } from './timeline-error';

export class ConfigError extends TimelineError {
  constructor(message: string, options: Omit<TimelineErrorOptions, 'code'> = {}) {
    super(message, 'config', { ...options, code: 'CONFIG_INVALID' });
  }
}
