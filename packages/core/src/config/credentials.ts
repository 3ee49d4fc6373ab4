import { promises as fs } from 'fs';
import path from 'path';
import { atomicWrite, ConfigError, expandHome } from '@evaluator/shared';

export const CREDENTIALS_FILENAME = 'config';
export const TOKEN_KEY = 'token';
export const REGISTRY_USERNAME_KEY = 'docker_username';

export const MISSING_TOKEN_MESSAGE =
  'Please set a token using the command "evaluator token set <token>".';

type Credentials = Record<string, unknown>;

function isRecord(value: unknown): value is Credentials {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function credentialsPath(rootDir: string): string {
  return path.join(expandHome(rootDir), CREDENTIALS_FILENAME);
}

async function readCredentials(filePath: string): Promise<Credentials> {
  const content = await fs.readFile(filePath, 'utf8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Credentials file is not valid JSON: ${filePath}`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Credentials file must contain a JSON object: ${filePath}`);
  }
  return parsed;
}

/** Like readCredentials, but a missing file reads as empty. */
async function readCredentialsIfPresent(filePath: string): Promise<Credentials> {
  try {
    return await readCredentials(filePath);
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }
}

/**
 * Reads the server token from `<rootDir>/config`.
 */
export async function readToken(rootDir: string): Promise<string> {
  const filePath = credentialsPath(rootDir);

  let credentials: Credentials;
  try {
    credentials = await readCredentials(filePath);
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    throw new ConfigError(`Could not read credentials file ${filePath}. ${MISSING_TOKEN_MESSAGE}`, {
      cause: error,
    });
  }

  const token = credentials[TOKEN_KEY];
  if (typeof token !== 'string' || token.length === 0) {
    throw new ConfigError(MISSING_TOKEN_MESSAGE, { details: { path: filePath } });
  }
  return token;
}

/**
 * Stores the token, keeping every other key of the credentials file.
 */
export async function saveToken(rootDir: string, token: string): Promise<string> {
  const filePath = credentialsPath(rootDir);
  const credentials = await readCredentialsIfPresent(filePath);
  credentials[TOKEN_KEY] = token;
  await atomicWrite(filePath, JSON.stringify(credentials, null, 2) + '\n');
  return filePath;
}

/**
 * Registry namespace artifacts are pushed to. `undefined` means publishing
 * is skipped.
 */
export async function readRegistryIdentity(
  rootDir: string,
  override?: string,
): Promise<string | undefined> {
  if (override) {
    return override;
  }
  const credentials = await readCredentialsIfPresent(credentialsPath(rootDir));
  const username = credentials[REGISTRY_USERNAME_KEY];
  return typeof username === 'string' && username.length > 0 ? username : undefined;
}
