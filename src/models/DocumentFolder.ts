/**
 * Folder hierarchy helpers.
 *
 * FolderTree indexes a set of folder rows by id and answers ancestor,
 * descendant and path questions without further queries.
 */

import type { DocumentFolder } from '../db/schema.js';

type FolderNode = Pick<DocumentFolder, 'id' | 'name' | 'parentId'>;

const FORBIDDEN_CHARACTERS = /[<>:"/\\|?*]/g;

/**
 * Make a folder name safe to use as a directory name
 */
export function sanitizeFolderName(name: string): string {
  const sanitized = name
    .replace(/ /g, '_')
    .replace(FORBIDDEN_CHARACTERS, '')
    .replace(/^[. ]+|[. ]+$/g, '');
  return sanitized || 'unnamed_folder';
}

export class FolderTree<T extends FolderNode = FolderNode> {
  private readonly byId = new Map<number, T>();
  private readonly children = new Map<number | null, T[]>();

  constructor(folders: Iterable<T>) {
    for (const folder of folders) {
      this.byId.set(folder.id, folder);
    }
    for (const folder of this.byId.values()) {
      const siblings = this.children.get(folder.parentId) ?? [];
      siblings.push(folder);
      this.children.set(folder.parentId, siblings);
    }
    for (const siblings of this.children.values()) {
      siblings.sort((a, b) => a.name.localeCompare(b.name));
    }
  }

  get(id: number): T | undefined {
    return this.byId.get(id);
  }

  all(): T[] {
    return [...this.byId.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  roots(): T[] {
    return this.childrenOf(null);
  }

  childrenOf(id: number | null): T[] {
    return this.children.get(id) ?? [];
  }

  /**
   * Ancestors of a folder, root first. The folder itself is not included.
   */
  ancestors(id: number): T[] {
    const chain: T[] = [];
    const seen = new Set<number>([id]);
    let parentId = this.byId.get(id)?.parentId ?? null;
    while (parentId !== null && !seen.has(parentId)) {
      const parent = this.byId.get(parentId);
      if (!parent) {
        break;
      }
      seen.add(parentId);
      chain.unshift(parent);
      parentId = parent.parentId;
    }
    return chain;
  }

  /**
   * All folders below the given one, breadth-first
   */
  descendants(id: number): T[] {
    const result: T[] = [];
    const seen = new Set<number>([id]);
    const queue = [...this.childrenOf(id)];
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next || seen.has(next.id)) {
        continue;
      }
      seen.add(next.id);
      result.push(next);
      queue.push(...this.childrenOf(next.id));
    }
    return result;
  }

  /**
   * Folder plus its ancestors, nearest first
   */
  selfAndAncestors(id: number): T[] {
    const self = this.byId.get(id);
    return self ? [self, ...this.ancestors(id).reverse()] : [];
  }

  fullPath(id: number): string {
    const self = this.byId.get(id);
    if (!self) {
      return '';
    }
    return [...this.ancestors(id), self].map(folder => folder.name).join('/');
  }

  filesystemPath(id: number): string {
    const self = this.byId.get(id);
    if (!self) {
      return '';
    }
    return [...this.ancestors(id), self].map(folder => sanitizeFolderName(folder.name)).join('/');
  }

  /**
   * True when moving `folderId` under `parentId` would close a loop
   */
  wouldCreateCycle(folderId: number, parentId: number): boolean {
    if (folderId === parentId) {
      return true;
    }
    return this.descendants(folderId).some(folder => folder.id === parentId);
  }
}
