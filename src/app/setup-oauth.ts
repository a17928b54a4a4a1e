#!/usr/bin/env node
/**
 * OAuth setup helper
 *
 * Runs the installed-app authorization flow once and prints the refresh token
 * the notifier needs. Usage: `npm run setup-oauth -- <client_secret.json>`
 */

import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { createInterface } from 'node:readline/promises';
import { Command } from 'commander';
import { OAuth2Client } from 'google-auth-library';
import { z } from 'zod';
import { YOUTUBE_SCOPES } from '../features/youtube-monitor';
import { ConfigurationError, createLogger, describeError } from '../shared/lib';

const logger = createLogger('setup-oauth');

const clientEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

const clientSecretsSchema = z.union([
  z.object({ installed: clientEntrySchema }),
  z.object({ web: clientEntrySchema }),
]);

export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

export interface OAuthResult extends ClientSecrets {
  refreshToken: string;
}

/**
 * Extract the client id and secret from a Google client secrets file
 */
export function parseClientSecrets(raw: string): ClientSecrets {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Client secrets file is not valid JSON: ${describeError(error)}`, {
      cause: error,
    });
  }

  const parsed = clientSecretsSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Client secrets file must contain an 'installed' or 'web' entry with client_id and client_secret"
    );
  }

  const entry = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;
  return { clientId: entry.client_id, clientSecret: entry.client_secret };
}

/**
 * Render the YOUTUBE_* variables plus placeholders for the rest
 */
export function renderEnvFile(result: OAuthResult): string {
  return [
    '# YouTube API credentials',
    `YOUTUBE_CLIENT_ID=${result.clientId}`,
    `YOUTUBE_CLIENT_SECRET=${result.clientSecret}`,
    `YOUTUBE_REFRESH_TOKEN=${result.refreshToken}`,
    '',
    '# Telegram bot credentials',
    'TELEGRAM_BOT_TOKEN=your_telegram_bot_token_here',
    'TELEGRAM_CHAT_ID=your_telegram_chat_id_here',
    '',
    '# Optional error reporting',
    'SENTRY_DSN=',
    '',
  ].join('\n');
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Loopback server has no port'));
        return;
      }
      resolve(address.port);
    });
  });
}

/**
 * Wait for Google to redirect back with an authorization code
 */
function waitForCode(server: Server): Promise<string> {
  return new Promise((resolve, reject) => {
    server.on('request', (req, res) => {
      const url = new URL(req.url ?? '/', 'http://127.0.0.1');
      const code = url.searchParams.get('code');
      const error = url.searchParams.get('error');

      if (error) {
        res.writeHead(400, { 'Content-Type': 'text/plain' });
        res.end('Authorization failed. You can close this window.');
        reject(new Error(`Authorization denied: ${error}`));
        return;
      }

      if (!code) {
        res.writeHead(404);
        res.end();
        return;
      }

      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('Authorization complete. You can close this window.');
      resolve(code);
    });
  });
}

async function authorize(secrets: ClientSecrets): Promise<OAuthResult> {
  const server = createServer();
  try {
    const port = await listen(server);
    const client = new OAuth2Client({
      clientId: secrets.clientId,
      clientSecret: secrets.clientSecret,
      redirectUri: `http://127.0.0.1:${port}`,
    });

    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: YOUTUBE_SCOPES,
    });

    console.log('\nOpen this URL in your browser and grant access:\n');
    console.log(authUrl);
    console.log('');

    const code = await waitForCode(server);
    const { tokens } = await client.getToken(code);
    if (!tokens.refresh_token) {
      throw new Error('Google did not return a refresh token; revoke the app grant and try again');
    }

    return { ...secrets, refreshToken: tokens.refresh_token };
  } finally {
    server.close();
  }
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(question);
    return answer.trim().toLowerCase().startsWith('y');
  } finally {
    rl.close();
  }
}

export async function main(argv: string[] = process.argv): Promise<number> {
  const program = new Command()
    .name('setup-oauth')
    .description('Obtain a YouTube refresh token for the subscription notifier')
    .argument('<client-secrets>', 'path to the OAuth client secrets JSON downloaded from Google Cloud')
    .option('--env-file <path>', 'where to write the .env template', '.env')
    .parse(argv);

  const [secretsPath] = program.args;
  const { envFile } = program.opts<{ envFile: string }>();

  try {
    if (!secretsPath || !existsSync(secretsPath)) {
      throw new ConfigurationError(`Client secrets file not found: ${secretsPath ?? ''}`);
    }

    const secrets = parseClientSecrets(await readFile(secretsPath, 'utf-8'));
    const result = await authorize(secrets);

    console.log('\nAdd these to your environment:\n');
    console.log(`YOUTUBE_CLIENT_ID=${result.clientId}`);
    console.log(`YOUTUBE_CLIENT_SECRET=${result.clientSecret}`);
    console.log(`YOUTUBE_REFRESH_TOKEN=${result.refreshToken}`);
    console.log('');

    if (existsSync(envFile)) {
      logger.info(`${envFile} already exists, not overwriting`);
    } else if (await confirm(`Write ${envFile} template? [y/N] `)) {
      await writeFile(envFile, renderEnvFile(result), 'utf-8');
      logger.info(`Wrote ${envFile}; fill in the Telegram values before running`);
    }

    return 0;
  } catch (error) {
    logger.error(`OAuth setup failed: ${describeError(error)}`);
    return 1;
  }
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (error: unknown) => {
      logger.error(`OAuth setup failed: ${describeError(error)}`);
      process.exit(1);
    }
  );
}
