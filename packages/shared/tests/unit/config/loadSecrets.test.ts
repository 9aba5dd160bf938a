import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadSecretsFromFiles } from '../../../src/config/loadSecrets';

describe('loadSecretsFromFiles', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'secrets-test-'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function secretFile(name: string, contents: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, contents);
    return filePath;
  }

  it('should promote trimmed file contents into the target variable', () => {
    const env: NodeJS.ProcessEnv = { DERIBIT_CLIENT_SECRET_FILE: secretFile('secret', '  test-secret\n') };

    const loaded = loadSecretsFromFiles({ env });

    expect(loaded).toEqual(['DERIBIT_CLIENT_SECRET']);
    expect(env.DERIBIT_CLIENT_SECRET).toBe('test-secret');
  });

  it('should not overwrite a variable that is already set', () => {
    const env: NodeJS.ProcessEnv = {
      DERIBIT_CLIENT_ID: 'from-env',
      DERIBIT_CLIENT_ID_FILE: secretFile('id', 'from-file'),
    };

    expect(loadSecretsFromFiles({ env })).toEqual([]);
    expect(env.DERIBIT_CLIENT_ID).toBe('from-env');
  });

  it('should only promote the listed keys', () => {
    const env: NodeJS.ProcessEnv = {
      DERIBIT_CLIENT_ID_FILE: secretFile('id', 'test-client'),
      OTHER_FILE: secretFile('other', 'ignored'),
    };

    const loaded = loadSecretsFromFiles({ env, keys: ['DERIBIT_CLIENT_ID'] });

    expect(loaded).toEqual(['DERIBIT_CLIENT_ID']);
    expect(env.OTHER).toBeUndefined();
  });

  it('should skip empty files', () => {
    const env: NodeJS.ProcessEnv = { TOKEN_FILE: secretFile('empty', '   \n') };

    expect(loadSecretsFromFiles({ env })).toEqual([]);
    expect(env.TOKEN).toBeUndefined();
  });

  it('should warn about missing files only when asked to', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    const env: NodeJS.ProcessEnv = { TOKEN_FILE: path.join(dir, 'missing') };

    expect(loadSecretsFromFiles({ env })).toEqual([]);
    expect(warnSpy).not.toHaveBeenCalled();

    loadSecretsFromFiles({ env, warnOnMissing: true });
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toMatch(/^Secret file missing for TOKEN: /);
  });
});
