#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfigOrDefaults, loadSecretStoreBootstrap } from './config/loader.js';
import logger from './config/logger.js';
import { BitwardenSecretStore } from './secrets/bitwarden-store.js';
import { TerminalConsole } from './auth/operator-console.js';
import { SpotifyClient, getTrackData } from './spotify/spotify-client.js';
import type { Configuration } from './types/index.js';

type CliOptions = {
  config: string;
  user?: string;
};

export function resolveUser(config: Configuration, user?: string): string {
  const resolved = user ?? config.user;
  if (!resolved) {
    throw new Error('No user given: pass --user or set `user` in the configuration');
  }
  return resolved;
}

export function createClient(options: CliOptions): SpotifyClient {
  // 1. Load configuration
  const config = loadConfigOrDefaults(options.config);
  const user = resolveUser(config, options.user);

  // 2. Connect the secret store
  const bootstrap = loadSecretStoreBootstrap(config.secrets.bootstrapFile);
  const secrets = new BitwardenSecretStore({
    bootstrap,
    apiUrl: config.secrets.apiUrl,
    identityUrl: config.secrets.identityUrl,
  });

  // 3. Wire resolver, lifecycle and flow behind the API client
  return SpotifyClient.fromConfig(user, config, secrets, new TerminalConsole());
}

export async function nowPlaying(client: SpotifyClient): Promise<void> {
  await client.setupCredentials();

  const playing = await client.getCurrentlyPlaying();
  const track = playing ? getTrackData(playing) : null;
  if (track) {
    logger.info({ track: track.name, artists: track.artists.map(a => a.name) }, `Currently Playing: ${track.name}`);
  } else {
    logger.warn('No track info found');
  }
}

async function runCommand(options: CliOptions, command: (client: SpotifyClient) => Promise<void>): Promise<void> {
  try {
    await command(createClient(options));
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Command failed');
    process.exitCode = 1;
  }
}

// CLI setup
const program = new Command();

program
  .name('spotify-creds')
  .description('Keep Spotify PKCE credentials in sync between a local cache and Bitwarden')
  .version('1.0.0')
  .option('-c, --config <path>', 'Path to configuration file', './config.yaml')
  .option('-u, --user <id>', 'User whose credentials to use');

program
  .command('now-playing', { isDefault: true })
  .description('Set up credentials and show the currently playing track')
  .action(async () => {
    await runCommand(program.opts<CliOptions>(), nowPlaying);
  });

program
  .command('login')
  .description('Run the interactive authorization flow')
  .action(async () => {
    await runCommand(program.opts<CliOptions>(), client => client.login());
  });

program
  .command('logout')
  .description('Remove the locally cached user tokens')
  .action(async () => {
    await runCommand(program.opts<CliOptions>(), client => client.logout());
  });

// Only run CLI when this module is executed directly (not imported in tests)
import { fileURLToPath } from 'url';
import { argv } from 'process';

const __filename = fileURLToPath(import.meta.url);
const isMain = argv[1] && (argv[1] === __filename || argv[1].endsWith('index.js') || argv[1].endsWith('index.ts'));
if (isMain) {
  await program.parseAsync();
}
