/**
 * Platform abstraction exports
 */

export * from './IFileSystem.js';
export * from './IProcessExecutor.js';
export * from './IDockerClient.js';
export * from './FileSystemAdapter.js';
export * from './ProcessExecutorAdapter.js';
export * from './DockerClientAdapter.js';
