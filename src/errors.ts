/**
 * Base error class for diffpress errors.
 */
export class DiffpressError extends Error {
	constructor(
		message: string,
		public override readonly cause?: Error,
	) {
		super(message);
		this.name = this.constructor.name;
	}
}

/**
 * Retryable errors - the caller may try again with backoff.
 */
export class RetryableError extends DiffpressError {}

/**
 * Non-retryable errors - the same input will fail the same way.
 */
export class NonRetryableError extends DiffpressError {}

// Specific error types

export class GitHubAPIError extends RetryableError {
	constructor(
		message: string,
		public readonly status?: number,
		cause?: Error,
	) {
		super(message, cause);
	}
}

export class InvalidPullRequestUrlError extends NonRetryableError {
	constructor(
		public readonly url: string,
		reason: string,
	) {
		super(`Invalid pull request URL "${url}": ${reason}`);
	}
}

export class ConfigError extends NonRetryableError {}
