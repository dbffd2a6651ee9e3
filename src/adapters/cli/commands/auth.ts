import { Command } from 'commander';
import { parseCallbackUrl, startCallbackServer, type PlaylistPruner } from '../../../core/index.js';
import { runCommand, type CommonOptions } from '../context.js';
import { formatStatus } from '../format.js';
import { Prompt } from '../prompt.js';
import type { AppConfig, Credential } from '../../../types/index.js';

interface LoginOptions extends CommonOptions {
  server: boolean;
  timeout: string;
}

export interface LoginSettings {
  useServer: boolean;
  timeoutMs: number;
}

function printAuthorizationLink(url: string): void {
  console.log('\n🔑 Open this link in a browser to authorize access to your YouTube account:');
  console.log(url);
  console.log('');
}

export async function login(
  pruner: PlaylistPruner,
  config: AppConfig,
  settings: LoginSettings,
  prompt: Prompt
): Promise<Credential> {
  if (!settings.useServer) {
    const { url } = await pruner.flow.beginAuthorization();
    printAuthorizationLink(url);
    const pasted = await prompt.ask('Paste the full URL the browser was redirected to: ');
    return pruner.flow.completeAuthorization(parseCallbackUrl(pasted));
  }

  const server = await startCallbackServer(config.redirectUri, { timeoutMs: settings.timeoutMs });
  try {
    const { url } = await pruner.flow.beginAuthorization();
    printAuthorizationLink(url);
    const listening = new URL(config.redirectUri);
    listening.port = String(server.port);
    console.log(`⏳ Waiting for the redirect to ${listening.toString()} ...`);
    const params = await server.waitForCallback();
    return await pruner.flow.completeAuthorization(params);
  } finally {
    await server.close();
  }
}

export function parseTimeoutSeconds(raw: string): number {
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Invalid timeout: ${raw}`);
  }
  return Math.round(seconds * 1000);
}

export function createAuthCommand(): Command {
  const command = new Command('auth').description('Sign in to Google and manage the stored credential');

  command
    .command('login')
    .description('Authorize access to your YouTube account')
    .option('--no-server', 'Paste the redirected URL instead of running a local callback server')
    .option('-t, --timeout <seconds>', 'How long to wait for the browser redirect', '300')
    .option('--verbose', 'Verbose output')
    .action(async (options: LoginOptions) => {
      await runCommand(options, async ({ pruner, config }) => {
        const prompt = new Prompt();
        try {
          const credential = await login(
            pruner,
            config,
            { useServer: options.server, timeoutMs: parseTimeoutSeconds(options.timeout) },
            prompt
          );
          console.log('✅ Signed in.');
          console.log(`   Scopes: ${credential.scopes.join(' ')}`);
          if (config.sessionOnly) {
            console.log('⚠️  Session-only mode: this sign-in ends with this process. Use "yt-pruner interactive".');
          }
        } finally {
          prompt.close();
        }
      });
    });

  command
    .command('status')
    .description('Show whether a usable credential is stored')
    .option('--verbose', 'Verbose output')
    .action(async (options: CommonOptions) => {
      await runCommand(options, async ({ pruner }) => {
        const status = await pruner.session.status();
        console.log(`${status.kind === 'unauthenticated' ? '❌' : '✅'} ${formatStatus(status)}`);
        if (status.kind !== 'unauthenticated' && options.verbose) {
          console.log(`   Scopes: ${status.scopes.join(' ')}`);
        }
      });
    });

  command
    .command('logout')
    .description('Forget the stored credential')
    .option('--verbose', 'Verbose output')
    .action(async (options: CommonOptions) => {
      await runCommand(options, async ({ pruner }) => {
        await pruner.session.reset();
        console.log('✅ Signed out.');
      });
    });

  return command;
}
