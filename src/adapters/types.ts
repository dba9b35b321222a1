/**
 * Adapter interfaces for the backing store of a configuration.
 * The core hands text to a store and receives text from it; it never touches
 * the file system itself.
 */

/**
 * Persistence collaborator for {@link Config.load} and {@link Config.save}.
 */
export interface ConfigStore {
  /**
   * Human-readable location, used in messages.
   */
  readonly location: string;

  /**
   * Read the stored document.
   * @returns The document text, or `undefined` when nothing has been stored yet
   * @throws If the store exists but cannot be read
   */
  read(): Promise<string | undefined>;

  /**
   * Replace the stored document.
   * @throws If the document cannot be written
   */
  write(content: string): Promise<void>;
}
