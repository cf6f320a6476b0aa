import type {
  ArtifactGenerator,
  GenerationRequest,
  GeneratorOutcome,
  GeneratorSet,
  Stage,
} from '@envforge/shared';

export type Respond = (request: GenerationRequest) => GeneratorOutcome | Promise<GeneratorOutcome>;

/** Generator whose answers are supplied by the test; records every request */
export class ScriptedGenerator implements ArtifactGenerator {
  readonly requests: GenerationRequest[] = [];

  constructor(
    readonly stage: Stage,
    private readonly respond: Respond,
  ) {}

  async generate(request: GenerationRequest): Promise<GeneratorOutcome> {
    this.requests.push(request);
    return this.respond(request);
  }
}

export const TEST_PATCH = [
  'diff --git a/tests/test_core.py b/tests/test_core.py',
  '--- a/tests/test_core.py',
  '+++ b/tests/test_core.py',
  '@@ -1 +1,2 @@',
  ' import widgets',
  '+def test_area(): assert widgets.area(2, 3) == 6',
  '',
].join('\n');

export type ScriptedSet = Record<Stage, ScriptedGenerator>;

export function scriptedGenerators(overrides: Partial<ScriptedSet> = {}): {
  scripted: ScriptedSet;
  set: GeneratorSet;
} {
  const scripted: ScriptedSet = {
    context: new ScriptedGenerator('context', () => ({ ok: true, artifact: 'widgets/core.py: area()' })),
    test: new ScriptedGenerator('test', () => ({ ok: true, artifact: TEST_PATCH })),
    env: new ScriptedGenerator('env', () => ({ ok: true, artifact: 'FROM python:3.11\n' })),
    run: new ScriptedGenerator('run', () => ({ ok: true, artifact: 'pytest tests/test_core.py\n' })),
    ...overrides,
  };
  return { scripted, set: scripted };
}
