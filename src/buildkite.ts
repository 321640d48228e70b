import type { CommandRunner } from './shell.js';

export interface CommandStep {
  label: string;
  commands: string[];
  agents: { queue: string };
}

/** "wait" blocks later steps until every earlier step has passed. */
export type PipelineStep = CommandStep | 'wait';

export interface Pipeline {
  steps: PipelineStep[];
}

export function commandStep(label: string, commands: string[], queue: string): CommandStep {
  return { label, commands, agents: { queue } };
}

export function serializePipeline(pipeline: Pipeline): string {
  return JSON.stringify(pipeline, null, 2);
}

/** Hands the pipeline to the running agent; the agent accepts JSON on stdin. */
export async function uploadPipeline(runner: CommandRunner, pipeline: Pipeline): Promise<void> {
  await runner.run('buildkite-agent', ['pipeline', 'upload'], { input: serializePipeline(pipeline) });
}
