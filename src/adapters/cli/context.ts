import { config as loadEnv } from 'dotenv';
import { PlaylistPruner, loadConfig } from '../../core/index.js';
import type { AppConfig } from '../../types/index.js';

export interface CommonOptions {
  verbose?: boolean;
}

export interface CommandContext {
  config: AppConfig;
  pruner: PlaylistPruner;
  verbose: boolean;
}

export function createContext(options: CommonOptions): CommandContext {
  loadEnv();
  const verbose = options.verbose ?? false;
  const config = loadConfig();
  const pruner = PlaylistPruner.fromConfig(config, {
    onProgress: (message) => console.log(`ℹ️  ${message}`),
    onDebug: verbose ? (message) => console.log(`🔍 ${message}`) : undefined,
    onSessionReset: (error) =>
      console.warn(`⚠️  Stored sign-in cleared after: ${error.message}`),
  });
  return { config, pruner, verbose };
}

export function reportError(error: unknown, verbose: boolean): void {
  if (error instanceof Error) {
    console.error(`❌ Error: ${error.message}`);
    if (verbose && error.stack) {
      console.error(`📋 Stack trace:\n${error.stack}`);
    }
    if (verbose && error.cause) {
      console.error(`🔗 Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`);
    }
  } else {
    console.error('❌ Error:', error);
  }
}

/**
 * Builds the context, runs one command and reports any failure as text with
 * a non-zero exit code.
 */
export async function runCommand(
  options: CommonOptions,
  action: (context: CommandContext) => Promise<void>
): Promise<void> {
  let context: CommandContext | undefined;
  try {
    context = createContext(options);
    await action(context);
  } catch (error) {
    reportError(error, options.verbose ?? false);
    process.exitCode = 1;
  } finally {
    context?.pruner.close();
  }
}
