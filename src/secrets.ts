import type { StoreConfig } from './config';
import { openText, seal } from './envelope';
import { NotFoundError, UsageError } from './errors';
import { loadOrGenerate } from './keystore';
import { RecordStore } from './store';

export const normalizeService = (service: string): string => {
  const trimmed = service.trim();
  if (!trimmed) {
    throw new UsageError('Service name cannot be empty');
  }
  return trimmed;
};

/** Seals `password` under the master key and persists it. Resolves `true` when an entry was replaced. */
export const addSecret = async (config: StoreConfig, service: string, password: string): Promise<boolean> => {
  const name = normalizeService(service);
  const key = await loadOrGenerate(config.keyFile);
  const store = await RecordStore.load(config.dataFile);

  const replaced = store.has(name);
  store.add(name, await seal(password, key));
  await store.save();

  return replaced;
};

export const getSecret = async (config: StoreConfig, service: string): Promise<string> => {
  const name = normalizeService(service);
  const store = await RecordStore.load(config.dataFile);

  const record = store.get(name);
  if (record === undefined) {
    throw new NotFoundError(name);
  }

  const key = await loadOrGenerate(config.keyFile);
  return openText(record, key);
};

export const deleteSecret = async (config: StoreConfig, service: string): Promise<boolean> => {
  const name = normalizeService(service);
  const store = await RecordStore.load(config.dataFile);

  if (!store.remove(name)) {
    return false;
  }

  await store.save();
  return true;
};

export const listServices = async (config: StoreConfig): Promise<string[]> => {
  const store = await RecordStore.load(config.dataFile);
  return store.list();
};
