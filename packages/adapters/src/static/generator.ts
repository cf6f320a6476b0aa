import path from 'path';
import {
  ARTIFACT_FILES,
  STAGE_OUTPUT,
  readTextIfExists,
  type ArtifactGenerator,
  type GenerationRequest,
  type GeneratorOutcome,
  type Stage,
} from '@envforge/shared';

/**
 * Serves pre-authored artifacts from `<dir>/<instanceId>/`, e.g. the output
 * of an earlier run, so they can be validated again without generation.
 */
export class StaticGenerator implements ArtifactGenerator {
  constructor(
    readonly stage: Stage,
    private readonly dir: string,
  ) {}

  fileFor(instanceId: string): string {
    return path.join(this.dir, instanceId, ARTIFACT_FILES[STAGE_OUTPUT[this.stage]]);
  }

  async generate(request: GenerationRequest): Promise<GeneratorOutcome> {
    const file = this.fileFor(request.instance.instanceId);
    const content = await readTextIfExists(file);
    if (content === undefined) {
      return { ok: false, reason: `no pre-authored artifact at ${file}` };
    }
    return { ok: true, artifact: content };
  }
}
