/**
 * `adaptive-container simulate <events>` — replay recorded interactions.
 *
 * Drives a container with a JSONL file as its data source and prints every
 * prediction the container broadcasts.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { forUser } from '../../container/builder.js';
import type { InteractionEvent, Prediction } from '../../container/types.js';
import { TaskScope } from '../../core/scope.js';
import { FrequencyLearningEngine } from '../../engines/frequency-engine.js';
import { DslInstructionParser } from '../../instructions/parser.js';
import type { Instruction } from '../../instructions/types.js';
import { IterableDataSource } from '../../sources/iterable-source.js';
import { readInteractions } from '../../sources/jsonl.js';
import { createRuntime, formatConfidence, type CommonOptions } from '../runtime.js';

interface SimulateOptions extends CommonOptions {
  user: string;
  instructions?: string;
  save?: boolean;
  reset?: boolean;
}

export function createSimulateCommand(): Command {
  const cmd = new Command('simulate');

  cmd
    .description('Replay a JSONL file of interactions through a container')
    .argument('<events>', 'Path to a JSON-lines file of interactions')
    .requiredOption('-u, --user <id>', 'User the container belongs to')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-i, --instructions <file>', 'Instruction DSL file')
    .option('--storage <path>', 'SQLite database path (overrides config)')
    .option('--reset', 'Wipe learned state and history before replaying')
    .option('--save', 'Save engine state when the replay finishes')
    .option('-v, --verbose', 'Pretty-print logs to the terminal')
    .action(async (events: string, options: SimulateOptions) => {
      await simulate(events, options);
    });

  return cmd;
}

export async function simulate(eventsPath: string, options: SimulateOptions): Promise<void> {
  const { config, logger, storage } = createRuntime(options);

  const parser = new DslInstructionParser();
  const instructions: Instruction[] = parser.parse(config.instructions.join('\n'));
  if (options.instructions) {
    instructions.push(...parser.parse(readFileSync(options.instructions, 'utf-8')));
  }

  // Resolves when a replay reads the file to the end
  let markFinished: () => void = () => undefined;
  let finished = new Promise<void>((resolve) => {
    markFinished = resolve;
  });
  const replay = async function* (): AsyncGenerator<InteractionEvent> {
    yield* readInteractions(eventsPath, options.user);
    markFinished();
  };

  const scope = new TaskScope();
  const container = forUser(options.user)
    .withLearningEngine(new FrequencyLearningEngine({
      minObservations: config.engine.minObservations,
      logger,
    }))
    .withDataStorage(storage)
    .withDataSource(new IterableDataSource(replay))
    .withScope(scope)
    .withInstructions(instructions)
    .withConfig(config)
    .withLogger(logger)
    .build();

  let seen = 0;
  container.onPrediction((prediction) => {
    seen++;
    console.log(`  ${String(seen).padStart(4)}  ${describe(prediction)}`);
  });
  container.events.on('observation:failed', ({ error }) => {
    console.error(`\n  Replay stopped: ${error.cause?.message ?? error.message}\n`);
    process.exitCode = 1;
    markFinished();
  });

  try {
    await container.initialize();

    if (options.reset) {
      finished = new Promise<void>((resolve) => {
        markFinished = resolve;
      });
      await container.reset();
    }

    console.log(`\n  Replaying ${eventsPath} for ${options.user}\n`);
    await finished;
    await scope.idle();

    const final = await container.getPrediction();
    const insights = await container.getLearningInsights();
    console.log();
    console.log(`  Next action: ${describe(final)}`);
    console.log(`  Interactions learned: ${insights.interactionCount}`);
    console.log(`  Progress: ${formatConfidence(insights.progressEstimate)}`);

    if (options.save) {
      await container.saveState();
      console.log('  State saved.');
    }
    console.log();
  } finally {
    await container.release();
    scope.cancel();
  }
}

function describe(prediction: Prediction | null): string {
  if (!prediction) return '(no prediction)';
  return `${prediction.suggestion} (${formatConfidence(prediction.confidence)}, ${prediction.category})`;
}
