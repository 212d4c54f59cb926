/**
 * Resolves the configured folder reference to a Graph folder id.
 *
 * Folder ids are not stable across mailbox migrations, so resolution happens
 * at the start of every run instead of being cached.
 */

import { NotFoundError } from "../core/errors.js";
import type { Logger } from "../core/types.js";
import type {
  FolderNode,
  FolderRef,
  FolderSource,
  FolderSpec,
  MailFolder,
} from "./types.js";

const ROOT_NAME = "(mailbox root)";

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export class FolderResolver {
  private readonly source: FolderSource;
  private readonly logger: Logger;

  constructor(source: FolderSource, logger: Logger) {
    this.source = source;
    this.logger = logger;
  }

  async resolve(folder: FolderSpec): Promise<FolderRef> {
    const id = folder.id?.trim();
    if (id) return { folderId: id, displayPath: id };

    const path = folder.path?.trim() ?? "";
    if (!path) throw new NotFoundError("No folder id or path configured");

    return path.includes("/")
      ? this.resolvePath(path)
      : this.resolveName(path);
  }

  /** Walk `A/B/C` one segment at a time from the root. */
  private async resolvePath(path: string): Promise<FolderRef> {
    const segments = path.split("/").map((s) => s.trim()).filter(Boolean);
    if (segments.length === 0) throw new NotFoundError(`Invalid folder path "${path}"`);

    let parentId: string | null = null;
    let parentName = ROOT_NAME;
    const names: string[] = [];

    for (const segment of segments) {
      const children = await this.source.listFolders(parentId);
      const match = children.find((f) => sameName(f.displayName, segment));
      if (!match) {
        throw new NotFoundError(`Folder "${segment}" not found under "${parentName}"`);
      }
      parentId = match.id;
      parentName = match.displayName;
      names.push(match.displayName);
    }

    if (parentId === null) throw new NotFoundError(`Invalid folder path "${path}"`);
    return { folderId: parentId, displayPath: names.join("/") };
  }

  /** Breadth-first search over the whole tree; the first match wins. */
  private async resolveName(name: string): Promise<FolderRef> {
    const queue: Array<{ parentId: string | null; prefix: string }> = [
      { parentId: null, prefix: "" },
    ];
    const matches: FolderRef[] = [];

    while (queue.length > 0 && matches.length < 2) {
      const next = queue.shift();
      if (!next) break;
      const children = await this.source.listFolders(next.parentId);
      for (const folder of children) {
        const displayPath = next.prefix + folder.displayName;
        if (sameName(folder.displayName, name)) {
          matches.push({ folderId: folder.id, displayPath });
        }
        if (folder.childFolderCount > 0) {
          queue.push({ parentId: folder.id, prefix: `${displayPath}/` });
        }
      }
    }

    const [first, second] = matches;
    if (!first) throw new NotFoundError(`Folder "${name}" not found`);
    if (second) {
      this.logger.warn(`Folder name "${name}" is ambiguous, using the first match`, {
        used: first.displayPath,
        alsoFound: second.displayPath,
      });
    }
    return first;
  }

  async listTree(): Promise<FolderNode[]> {
    return this.children(null);
  }

  private async children(parentId: string | null): Promise<FolderNode[]> {
    const folders: MailFolder[] = await this.source.listFolders(parentId);
    const nodes: FolderNode[] = [];
    for (const folder of folders) {
      nodes.push({
        ...folder,
        children: folder.childFolderCount > 0 ? await this.children(folder.id) : [],
      });
    }
    return nodes;
  }
}
