import fs from 'fs';

const FILE_SUFFIX = '_FILE';

export type LoadSecretsOptions = {
  /**
   * Only promote these variables (e.g. exchange credentials). All `*_FILE` keys when omitted.
   */
  keys?: readonly string[];
  /**
   * When true, logs warnings for missing files.
   */
  warnOnMissing?: boolean;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load environment variables from *_FILE paths (Docker secrets mounts).
 * If FOO is unset and FOO_FILE is set, the trimmed file contents are read into FOO.
 *
 * @returns the names of the variables that were populated
 */
export function loadSecretsFromFiles(options: LoadSecretsOptions = {}): string[] {
  const env = options.env ?? process.env;
  const warnOnMissing = options.warnOnMissing ?? false;
  const loaded: string[] = [];

  for (const [key, value] of Object.entries(env)) {
    if (!key.endsWith(FILE_SUFFIX) || !value) {
      continue;
    }

    const targetKey = key.slice(0, -FILE_SUFFIX.length);
    if (options.keys && !options.keys.includes(targetKey)) {
      continue;
    }
    if (env[targetKey]) {
      continue;
    }

    try {
      const secretValue = fs.readFileSync(value, 'utf8').trim();
      if (secretValue.length > 0) {
        env[targetKey] = secretValue;
        loaded.push(targetKey);
      }
    } catch (error) {
      if (warnOnMissing) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`Secret file missing for ${targetKey}: ${message}`);
      }
    }
  }

  return loaded;
}
