import fs from "node:fs";
import path from "node:path";

export interface DocumentStore {
  /** Persists bytes under `{label}.pdf`, returning the output reference. */
  save(label: string, bytes: Buffer): Promise<string>;
  exists(reference: string): Promise<boolean>;
}

async function fileExists(reference: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(path.resolve(reference));
    return stat.isFile() && stat.size > 0;
  } catch {
    return false;
  }
}

export class FileDocumentStore implements DocumentStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  async save(label: string, bytes: Buffer): Promise<string> {
    const reference = path.join(this.directory, `${label}.pdf`);
    const absolutePath = path.resolve(reference);
    const tempPath = `${absolutePath}.part`;

    await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
    try {
      await fs.promises.writeFile(tempPath, bytes);
      await fs.promises.rename(tempPath, absolutePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }
    return reference;
  }

  exists(reference: string): Promise<boolean> {
    return fileExists(reference);
  }
}

export class DryRunDocumentStore implements DocumentStore {
  private readonly directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  async save(label: string, _bytes: Buffer): Promise<string> {
    return path.join(this.directory, `${label}.pdf`);
  }

  exists(reference: string): Promise<boolean> {
    return fileExists(reference);
  }
}
