import { AgentCoordinatorError, ErrorCode } from '../errors';

export interface ConfigIssue {
  /** Dotted path into the config, empty for the root */
  path: string;
  message: string;
}

/**
 * Configuration could not be read or failed validation.
 */
export class ConfigError extends AgentCoordinatorError {
  readonly issues: readonly ConfigIssue[];

  constructor(message: string, issues: readonly ConfigIssue[] = [], options?: { cause?: unknown }) {
    const details = issues.map(issue => `  ${issue.path || '(root)'}: ${issue.message}`).join('\n');
    super(ErrorCode.CONFIG_INVALID, details ? `${message}:\n${details}` : message, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
