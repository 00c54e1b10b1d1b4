/**
 * Google credential loading and the console OAuth consent flow
 */

import { readFile, writeFile } from 'fs/promises';
import { resolve } from 'path';
import { google } from 'googleapis';
import type { Auth } from 'googleapis';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  OAuthClientSecretSchema,
  ServiceAccountKeySchema,
  StoredTokenSchema,
  formatValidationErrors,
} from '../../schemas/index.js';
import type {
  OAuthAuthSettings,
  ServiceAccountAuthSettings,
  ValidatedOAuthClient,
  ValidatedStoredToken,
} from '../../schemas/index.js';
import { GOOGLE_SCOPES } from './types.js';
import type { AuthorizeOptions, PromptFn } from './types.js';

const DEFAULT_REDIRECT_URI = 'http://localhost';

/**
 * Read and validate a JSON credential file
 *
 * @returns Parsed value, or null when the file does not exist and `optional` is set
 */
async function readJsonFile<T>(
  path: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
  optional: boolean
): Promise<T | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      if (optional) {
        return null;
      }
      throw new Error(`Credential file not found: ${path}`);
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse credential file ${path}: ${(error as Error).message}`);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    throw new Error(`Invalid credential file ${path}: ${formatValidationErrors(result.error).join('; ')}`);
  }
  return result.data;
}

/**
 * Load the OAuth client secret downloaded from the Cloud console
 */
export async function loadClientSecret(path: string): Promise<ValidatedOAuthClient> {
  const secret = await readJsonFile(path, OAuthClientSecretSchema, false);
  if (!secret) {
    throw new Error(`Credential file not found: ${path}`);
  }
  return secret;
}

/**
 * Load a cached OAuth token, or null if none was saved yet
 */
export async function loadStoredToken(path: string): Promise<ValidatedStoredToken | null> {
  return readJsonFile(path, StoredTokenSchema, true);
}

/**
 * Write a token to the cache file, merged over what was cached before
 *
 * Google only returns a refresh token on first consent, so a refreshed
 * access token must not drop it.
 */
export async function saveToken(path: string, tokens: Auth.Credentials): Promise<void> {
  const previous = await loadStoredToken(path);
  const merged = {
    access_token: tokens.access_token ?? previous?.access_token,
    refresh_token: tokens.refresh_token ?? previous?.refresh_token,
    scope: tokens.scope ?? previous?.scope,
    token_type: tokens.token_type ?? previous?.token_type,
    expiry_date: tokens.expiry_date ?? previous?.expiry_date,
  };
  await writeFile(path, JSON.stringify(merged, null, 2), { encoding: 'utf-8', mode: 0o600 });
}

/**
 * Whether a cached token can still be used without asking for consent
 */
export function isTokenUsable(token: Auth.Credentials, now: number = Date.now()): boolean {
  if (token.refresh_token) {
    return true;
  }
  if (!token.access_token) {
    return false;
  }
  return (token.expiry_date ?? Infinity) > now;
}

/**
 * Run the console consent flow: print the consent URL, read the code back
 */
async function runConsentFlow(client: Auth.OAuth2Client, prompt: PromptFn): Promise<Auth.Credentials> {
  const url = client.generateAuthUrl({
    access_type: 'offline',
    prompt: 'consent',
    scope: GOOGLE_SCOPES,
  });

  console.error('[google-auth] Authorize this app by visiting this URL:');
  console.error(url);
  const code = (await prompt('Enter the authorization code: ')).trim();
  if (!code) {
    throw new Error('No authorization code entered');
  }

  const { tokens } = await client.getToken(code);
  return tokens;
}

/**
 * Build an OAuth2 client from a client secret and cached token
 *
 * Falls back to the console consent flow when no usable token is cached.
 * Refreshed tokens are written back to the cache file.
 */
export async function authorizeOAuth(
  settings: OAuthAuthSettings,
  prompt: PromptFn,
  baseDir: string = process.cwd()
): Promise<Auth.OAuth2Client> {
  const secretPath = resolve(baseDir, settings.clientSecretPath);
  const tokenPath = resolve(baseDir, settings.tokenPath);

  const secret = await loadClientSecret(secretPath);
  const client = new google.auth.OAuth2(
    secret.client_id,
    secret.client_secret,
    secret.redirect_uris[0] ?? DEFAULT_REDIRECT_URI
  );

  const stored = await loadStoredToken(tokenPath);
  if (stored && isTokenUsable(stored)) {
    client.setCredentials(stored);
  } else {
    const tokens = await runConsentFlow(client, prompt);
    client.setCredentials(tokens);
    await saveToken(tokenPath, tokens);
    console.error(`[google-auth] Token stored to ${tokenPath}`);
  }

  client.on('tokens', (tokens) => {
    saveToken(tokenPath, tokens).catch((error: unknown) => {
      console.error(`[google-auth] Failed to update ${tokenPath}: ${(error as Error).message}`);
    });
  });

  return client;
}

/**
 * Build a JWT client from a service-account key
 */
export async function authorizeServiceAccount(
  settings: ServiceAccountAuthSettings,
  baseDir: string = process.cwd()
): Promise<Auth.JWT> {
  const keyPath = resolve(baseDir, settings.keyFilePath);
  const key = await readJsonFile(keyPath, ServiceAccountKeySchema, false);
  if (!key) {
    throw new Error(`Credential file not found: ${keyPath}`);
  }

  return new google.auth.JWT({
    email: key.client_email,
    key: key.private_key,
    keyId: key.private_key_id,
    scopes: GOOGLE_SCOPES,
    subject: settings.subject,
  });
}

/**
 * Build an authorized client for the configured credential mode
 */
export async function authorize(options: AuthorizeOptions): Promise<Auth.OAuth2Client> {
  const { settings, prompt, baseDir } = options;

  if (settings.mode === 'service-account') {
    console.error(`[google-auth] Using service account key ${settings.keyFilePath}`);
    return authorizeServiceAccount(settings, baseDir);
  }

  console.error(`[google-auth] Using OAuth client ${settings.clientSecretPath}`);
  return authorizeOAuth(settings, prompt, baseDir);
}
