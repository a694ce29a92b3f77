import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { StoreConfig } from '../config';
import { openText } from '../envelope';
import { AuthenticationError, FormatError, NotFoundError, UsageError } from '../errors';
import { readMasterKey } from '../keystore';
import { addSecret, deleteSecret, getSecret, listServices } from '../secrets';

const readDocument = (dataFile: string): { secrets: Record<string, string> } =>
  JSON.parse(readFileSync(dataFile, 'utf-8'));

describe('secret operations', () => {
  let dir: string;
  let config: StoreConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'sealbox-secrets-'));
    config = { dataFile: join(dir, 'data', 'secrets.json'), keyFile: join(dir, 'config', 'master.key') };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('stores a sealed record that decodes with the persisted key', async () => {
    assert.equal(await addSecret(config, 'github', 'p@ss1'), false);

    const document = readDocument(config.dataFile);
    assert.deepEqual(Object.keys(document.secrets), ['github']);
    assert.notEqual(document.secrets.github, 'p@ss1');

    const key = await readMasterKey(config.keyFile);
    assert.ok(key);
    assert.equal(await openText(document.secrets.github ?? '', key), 'p@ss1');
  });

  it('returns the stored password', async () => {
    await addSecret(config, 'github', 'p@ss1');
    assert.equal(await getSecret(config, 'github'), 'p@ss1');
  });

  it('reseals on re-add and reports the replacement', async () => {
    await addSecret(config, 'github', 'p@ss1');
    const before = readDocument(config.dataFile).secrets.github;

    assert.equal(await addSecret(config, 'github', 'p@ss2'), true);
    const after = readDocument(config.dataFile).secrets.github;

    assert.notEqual(after, before);
    assert.equal(await getSecret(config, 'github'), 'p@ss2');
  });

  it('trims service names', async () => {
    await addSecret(config, '  github ', 'p@ss1');
    assert.deepEqual(await listServices(config), ['github']);
    assert.equal(await getSecret(config, 'github'), 'p@ss1');
  });

  it('rejects an empty service name', async () => {
    await assert.rejects(addSecret(config, '   ', 'p@ss1'), UsageError);
    assert.equal(existsSync(config.dataFile), false);
  });

  it('raises NotFoundError for an unknown service without creating a key', async () => {
    await assert.rejects(getSecret(config, 'github'), NotFoundError);
    assert.equal(existsSync(config.keyFile), false);
  });

  it('keeps a secret stored under __proto__ through later writes', async () => {
    await addSecret(config, '__proto__', 'p@ss1');
    await addSecret(config, 'github', 'p@ss2');

    assert.deepEqual(await listServices(config), ['__proto__', 'github']);
    assert.equal(await getSecret(config, '__proto__'), 'p@ss1');
    assert.deepEqual(Object.keys(readDocument(config.dataFile).secrets), ['__proto__', 'github']);

    assert.equal(await deleteSecret(config, '__proto__'), true);
    assert.deepEqual(await listServices(config), ['github']);
  });

  it('never returns a deleted secret', async () => {
    await addSecret(config, 'github', 'p@ss1');

    assert.equal(await deleteSecret(config, 'github'), true);
    await assert.rejects(getSecret(config, 'github'), NotFoundError);
    assert.deepEqual(readDocument(config.dataFile), { secrets: {} });
  });

  it('treats deleting an unknown service as a no-op', async () => {
    assert.equal(await deleteSecret(config, 'github'), false);
    assert.equal(existsSync(config.dataFile), false);
  });

  it('lists nothing for a fresh store without creating a key', async () => {
    assert.deepEqual(await listServices(config), []);
    assert.equal(existsSync(config.keyFile), false);
  });

  it('reports records sealed under a lost key as authentication failures', async () => {
    await addSecret(config, 'github', 'p@ss1');
    rmSync(config.keyFile);

    await assert.rejects(getSecret(config, 'github'), AuthenticationError);
  });

  it('surfaces a corrupt data file instead of overwriting it', async () => {
    await addSecret(config, 'github', 'p@ss1');
    writeFileSync(config.dataFile, 'not json');

    await assert.rejects(addSecret(config, 'mail', 'p@ss2'), FormatError);
    assert.equal(readFileSync(config.dataFile, 'utf-8'), 'not json');
  });
});
