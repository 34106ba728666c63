/**
 * Custom error classes
 */

export class MwaaLocalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MwaaLocalError';
  }
}

export class ConfigurationError extends MwaaLocalError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// Container engine

export class DockerUnavailableError extends MwaaLocalError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DockerUnavailableError';
  }
}

export class ImageBuildError extends MwaaLocalError {
  constructor(
    message: string,
    public readonly tag: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ImageBuildError';
  }
}

export class ImagePullError extends MwaaLocalError {
  constructor(
    message: string,
    public readonly image: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ImagePullError';
  }
}

export class ContainerCreationError extends MwaaLocalError {
  constructor(
    message: string,
    public readonly containerName: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ContainerCreationError';
  }
}

export class ContainerStartError extends MwaaLocalError {
  constructor(
    message: string,
    public readonly containerId: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ContainerStartError';
  }
}

export class ContainerExitedError extends MwaaLocalError {
  constructor(
    message: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'ContainerExitedError';
  }
}

export class ContainerTimeoutError extends MwaaLocalError {
  constructor(
    message: string,
    public readonly timeoutSeconds: number
  ) {
    super(message);
    this.name = 'ContainerTimeoutError';
  }
}

// Parsing

export class MalformedLineError extends MwaaLocalError {
  constructor(
    public readonly lineNumber: number,
    public readonly line: string
  ) {
    super(`malformed line ${lineNumber}: ${line}`);
    this.name = 'MalformedLineError';
  }
}

export class ComposeDecodeError extends MwaaLocalError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ComposeDecodeError';
  }
}

export class ServiceNotFoundError extends MwaaLocalError {
  constructor(public readonly service: string) {
    super(`service ${service} not found`);
    this.name = 'ServiceNotFoundError';
  }
}

// Runner

export class AlreadyRunningError extends MwaaLocalError {
  constructor(public readonly label: string) {
    super(`local runner is already running (session ${label})`);
    this.name = 'AlreadyRunningError';
  }
}

export class PortInUseError extends MwaaLocalError {
  constructor(public readonly port: number) {
    super(`port ${port} is already in use`);
    this.name = 'PortInUseError';
  }
}

export type LifecyclePhase =
  | 'build'
  | 'preflight'
  | 'network'
  | 'reset'
  | 'dependency'
  | 'environment'
  | 'primary'
  | 'readiness'
  | 'logs';

export class LifecyclePhaseError extends MwaaLocalError {
  constructor(
    public readonly phase: LifecyclePhase,
    cause: unknown
  ) {
    super(`${phase} failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = 'LifecyclePhaseError';
  }
}

// Readiness

export class InvalidUrlError extends MwaaLocalError {
  constructor(public readonly url: string) {
    super(`invalid readiness url: ${url} (only http and https are allowed)`);
    this.name = 'InvalidUrlError';
  }
}

export class ReadinessTimeoutError extends MwaaLocalError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`timed out after ${timeoutMs}ms waiting for ${url}`);
    this.name = 'ReadinessTimeoutError';
  }
}

// Installer

export class NonEmptyTargetError extends MwaaLocalError {
  constructor(public readonly path: string) {
    super(`directory ${path} is not empty`);
    this.name = 'NonEmptyTargetError';
  }
}

export class UnsafePathError extends MwaaLocalError {
  constructor(public readonly entry: string) {
    super(`refusing to write outside the target directory: ${entry}`);
    this.name = 'UnsafePathError';
  }
}

export class RepositoryFetchError extends MwaaLocalError {
  constructor(message: string) {
    super(message);
    this.name = 'RepositoryFetchError';
  }
}

// AWS

export class InvalidArnError extends MwaaLocalError {
  constructor(public readonly arn: string) {
    super(`invalid ARN: ${arn}`);
    this.name = 'InvalidArnError';
  }
}

export class ArchiveEntryTooLargeError extends MwaaLocalError {
  constructor(
    public readonly entry: string,
    public readonly size: number
  ) {
    super(`archive entry ${entry} is too large (${size} bytes)`);
    this.name = 'ArchiveEntryTooLargeError';
  }
}

export class RestApiError extends MwaaLocalError {
  constructor(
    public readonly title: string,
    public readonly detail: string,
    public readonly statusCode: number
  ) {
    super(`${title} (${statusCode}): ${detail}`);
    this.name = 'RestApiError';
  }
}

export class CliCommandError extends MwaaLocalError {
  constructor(
    public readonly detail: string,
    public readonly statusCode: number
  ) {
    super(`${detail} (HTTP ${statusCode})`);
    this.name = 'CliCommandError';
  }
}

export class UnsupportedBackendError extends MwaaLocalError {
  constructor(public readonly backend: string) {
    super(`unsupported secrets backend: ${backend}`);
    this.name = 'UnsupportedBackendError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
