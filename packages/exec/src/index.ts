export const name = '@envforge/exec';

export { SubprocessRunner, getSafeEnv } from './runner/runner';
export type { CommandRequest, CommandResult, CommandRunner } from './runner/runner';
export { extractExitCode, toRunOutcome } from './classify/outcome';
export type { ScriptExecution } from './classify/outcome';
export { DockerSandboxProvider, DockerSession, CONTAINER_LABEL } from './sandbox/docker';
export type { DockerSandboxConfig, DockerSandboxProviderOptions } from './sandbox/docker';
export { ESSENTIALS_LAYER, ensureEssentials, injectBuildArgs, prepareDockerfile } from './sandbox/dockerfile';
export type * from './sandbox/types';
