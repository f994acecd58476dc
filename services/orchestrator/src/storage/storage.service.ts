export interface StoredFile {
  name: string;
  folder: string;
  size: number;
  location: string;
}

export interface StorageService {
  /** Copies a local file into `<folder>/<name>` of the backing store. */
  store(localPath: string, name: string, folder: string): Promise<StoredFile>;
}
