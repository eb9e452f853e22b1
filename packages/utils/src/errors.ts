export type ElectionErrorMetaData = Record<string, string | number | null>;

/**
 * Generic error with attached metadata. `type.code` identifies the failure, the rest of `type`
 * is rendered as log context.
 */
export class ElectionError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): ElectionErrorMetaData {
    const metadata: ElectionErrorMetaData = {};
    for (const [key, value] of Object.entries(this.type)) {
      metadata[key] = typeof value === "number" || typeof value === "string" || value === null ? value : String(value);
    }
    return metadata;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): ElectionErrorMetaData {
    return {
      // Ignore message since it's just type.code
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}
