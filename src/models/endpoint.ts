/**
 * Inference endpoint descriptor
 *
 * Discovered fresh at the start of a batch and shared read-only by all
 * workers for the lifetime of that batch.
 */
export interface EndpointDescriptor {
  /** Full generate URL, e.g. http://127.0.0.1:11434/api/generate */
  readonly address: string;
  /** Ollama model tag served at this endpoint */
  readonly modelName: string;
}
