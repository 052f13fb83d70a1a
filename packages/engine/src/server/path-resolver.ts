import * as path from "node:path";
import type { HttpRequest } from "../http/types.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type { MimeRegistry } from "./mime-registry.js";

export type PathResolutionErrorCode =
  | "METHOD_NOT_ALLOWED"
  | "TRAVERSAL"
  | "TYPE_NOT_ALLOWED"
  | "NOT_FOUND";

export class PathResolutionError extends Error {
  constructor(
    readonly code: PathResolutionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "PathResolutionError";
  }
}

/** A request target that is safe to read. */
export interface ResolvedTarget {
  /** Always the root directory or below it. */
  absolutePath: string;
  /** Lower-cased, with the leading dot. */
  extension: string;
  contentType: string;
}

export interface PathResolverOptions {
  root: string;
  mimeRegistry: MimeRegistry;
  fs: IFileSystem;
  caseInsensitive?: boolean;
}

// Case is folded only where the file system itself ignores it; elsewhere a
// case-insensitive prefix test would admit sibling directories.
const CASE_INSENSITIVE_PLATFORMS = new Set<string>(["win32", "darwin"]);

export class PathResolver {
  readonly root: string;
  private readonly mimeRegistry: MimeRegistry;
  private readonly fs: IFileSystem;
  private readonly caseInsensitive: boolean;

  constructor(options: PathResolverOptions) {
    this.root = stripTrailingSeparators(path.resolve(options.root));
    this.mimeRegistry = options.mimeRegistry;
    this.fs = options.fs;
    this.caseInsensitive =
      options.caseInsensitive ??
      CASE_INSENSITIVE_PLATFORMS.has(process.platform);
  }

  async resolve(request: HttpRequest): Promise<ResolvedTarget> {
    if (request.method !== "GET") {
      throw new PathResolutionError(
        "METHOD_NOT_ALLOWED",
        `Method not allowed: ${request.method || "(empty)"}`,
      );
    }

    const requested = request.target === "/" ? "/index.html" : request.target;
    const candidate = requested.replace(/^[\\/]+/, "");

    // Syntactic pre-filter. The prefix check on the joined path below runs
    // either way.
    if (mayEscapeRoot(candidate)) {
      const normalized = path.resolve(this.root, candidate);
      if (!this.isInsideRoot(normalized, this.root)) {
        throw new PathResolutionError(
          "TRAVERSAL",
          `Target escapes the root: ${request.target}`,
        );
      }
    }

    const extension = path.extname(candidate).toLowerCase();
    const contentType = this.mimeRegistry.lookup(extension);
    if (!extension || !contentType) {
      throw new PathResolutionError(
        "TYPE_NOT_ALLOWED",
        `File type not allowed: ${request.target}`,
      );
    }

    const absolutePath = path.join(this.root, candidate);
    if (!this.isInsideRoot(absolutePath, this.root)) {
      throw new PathResolutionError(
        "TRAVERSAL",
        `Target escapes the root: ${request.target}`,
      );
    }

    if (!(await this.isRegularFile(absolutePath))) {
      throw new PathResolutionError(
        "NOT_FOUND",
        `No such file: ${request.target}`,
      );
    }

    await this.assertRealPathInsideRoot(absolutePath, request.target);

    return { absolutePath, extension, contentType };
  }

  private async isRegularFile(filePath: string): Promise<boolean> {
    if (!(await this.fs.exists(filePath))) {
      return false;
    }
    const stat = await this.fs.stat(filePath);
    return stat.isFile;
  }

  /** Refuses symlinks whose destination lies outside the root. */
  private async assertRealPathInsideRoot(
    filePath: string,
    target: string,
  ): Promise<void> {
    if (!this.fs.realpath) return;

    const [realRoot, realFile] = await Promise.all([
      this.fs.realpath(this.root),
      this.fs.realpath(filePath),
    ]);
    if (!this.isInsideRoot(realFile, stripTrailingSeparators(realRoot))) {
      throw new PathResolutionError(
        "TRAVERSAL",
        `Target links outside the root: ${target}`,
      );
    }
  }

  private isInsideRoot(candidate: string, root: string): boolean {
    const fold = (value: string) =>
      this.caseInsensitive ? value.toLowerCase() : value;
    const target = fold(candidate);
    const base = fold(root);
    if (target === base) return true;
    const prefix = base.endsWith(path.sep) ? base : base + path.sep;
    return target.startsWith(prefix);
  }
}

function mayEscapeRoot(candidate: string): boolean {
  return (
    candidate.includes("..") ||
    path.isAbsolute(candidate) ||
    candidate.includes("/") ||
    candidate.includes(path.sep)
  );
}

function stripTrailingSeparators(dir: string): string {
  const { root } = path.parse(dir);
  let end = dir.length;
  while (end > root.length && (dir[end - 1] === "/" || dir[end - 1] === path.sep)) {
    end--;
  }
  return dir.slice(0, end);
}
