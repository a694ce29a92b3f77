import { readFile } from 'node:fs/promises';
import type { EncryptedRecord } from './envelope';
import { DataIOError, errorMessage, FormatError } from './errors';
import { SecretsDocumentSchema, type SecretsDocument } from './schemas';
import { isMissingFileError, writeFileAtomic } from './utils';

/**
 * In-memory mapping from service name to sealed record, backed by a JSON
 * document that is rewritten whole on every save.
 */
export class RecordStore {
  private constructor(
    readonly dataFile: string,
    private readonly records: Map<string, EncryptedRecord>
  ) {}

  static empty(dataFile: string): RecordStore {
    return new RecordStore(dataFile, new Map());
  }

  /**
   * A missing data file is an empty store. A file that exists but cannot be
   * parsed raises {@link FormatError} rather than being discarded.
   */
  static async load(dataFile: string): Promise<RecordStore> {
    let text: string;
    try {
      text = await readFile(dataFile, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return RecordStore.empty(dataFile);
      }
      throw new DataIOError(`Failed to read data file ${dataFile}: ${errorMessage(error)}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new FormatError(`Data file ${dataFile} is not valid JSON`, error);
    }

    const parsed = SecretsDocumentSchema.safeParse(json);
    if (!parsed.success) {
      throw new FormatError(`Data file ${dataFile} is malformed`, parsed.error.issues);
    }

    return new RecordStore(dataFile, new Map(parsed.data.secrets));
  }

  async save(): Promise<void> {
    const document: SecretsDocument = { secrets: Object.fromEntries(this.records) };
    try {
      await writeFileAtomic(this.dataFile, `${JSON.stringify(document, null, 2)}\n`);
    } catch (error) {
      throw new DataIOError(`Failed to write data file ${this.dataFile}: ${errorMessage(error)}`, error);
    }
  }

  get size(): number {
    return this.records.size;
  }

  get(service: string): EncryptedRecord | undefined {
    return this.records.get(service);
  }

  has(service: string): boolean {
    return this.records.has(service);
  }

  add(service: string, record: EncryptedRecord): void {
    this.records.set(service, record);
  }

  remove(service: string): boolean {
    return this.records.delete(service);
  }

  list(): string[] {
    return [...this.records.keys()].sort();
  }
}
