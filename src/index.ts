#!/usr/bin/env node
/**
 * Snapchat memories to Immich
 * CLI entry point
 */

import {
  createProgram,
  runAllPhases,
  runDownloadPhase,
  runExtractPhase,
  runProcessPhase,
  runRepairPhase,
  runUploadPhase,
  shouldRunInteractive,
} from './cli.js';
import { type InteractiveConfig, runInteractivePrompts } from './interactive.js';
import { closeExiftool } from './metadata.js';

async function runInteractiveAction(config: InteractiveConfig): Promise<void> {
  switch (config.action) {
    case 'run':
      await runAllPhases(config.inputPath, config);
      break;
    case 'extract':
      await runExtractPhase(config.inputPath, config);
      break;
    case 'download':
      await runDownloadPhase(config.inputPath, config);
      break;
    case 'process':
      await runProcessPhase(config.inputPath, config);
      break;
    case 'upload':
      await runUploadPhase(config.inputPath, config);
      break;
    case 'repair':
      await runRepairPhase(config.inputPath, config);
      break;
  }
}

function isPromptClosed(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'ExitPromptError' || ('code' in error && error.code === 'ERR_USE_AFTER_CLOSE'))
  );
}

async function main(): Promise<void> {
  if (shouldRunInteractive(process.argv)) {
    try {
      const config = await runInteractivePrompts();
      if (config) {
        await runInteractiveAction(config);
      }
    } catch (error) {
      if (isPromptClosed(error)) {
        // User pressed Ctrl+C during prompts
        console.log('\nCancelled.');
      } else {
        console.error('Error:', error instanceof Error ? error.message : 'Unknown error');
        process.exitCode = 1;
      }
    } finally {
      await closeExiftool();
    }
    return;
  }

  await createProgram().parseAsync();
}

main().catch((error: unknown) => {
  console.error('Error:', error instanceof Error ? error.message : 'Unknown error');
  process.exitCode = 1;
});
