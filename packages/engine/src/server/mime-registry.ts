const DEFAULT_MIME_TYPES: Readonly<Record<string, string>> = {
  ".html": "text/html",
  ".css": "text/css",
  ".js": "application/javascript",
};

function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * Extension → content-type allow-list. Only files whose extension is
 * registered here are ever served.
 */
export class MimeRegistry {
  private readonly types: ReadonlyMap<string, string>;

  constructor(extra: Readonly<Record<string, string>> = {}) {
    const types = new Map<string, string>();
    for (const [ext, contentType] of Object.entries(DEFAULT_MIME_TYPES)) {
      types.set(ext, contentType);
    }
    for (const [ext, contentType] of Object.entries(extra)) {
      if (ext.length === 0 || ext === ".") continue;
      types.set(normalizeExtension(ext), contentType);
    }
    this.types = types;
  }

  lookup(extension: string): string | undefined {
    if (!extension) return undefined;
    return this.types.get(normalizeExtension(extension));
  }

  has(extension: string): boolean {
    return this.lookup(extension) !== undefined;
  }

  extensions(): string[] {
    return [...this.types.keys()];
  }
}
