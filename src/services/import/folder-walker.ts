import type { Dirent } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { errorMessage } from '../../errors.js';
import { logger } from '../../logger.js';

export interface FolderNode {
  path: string;
  depth: number;
  children: FolderNode[];
  files: string[];
}

export interface WalkOptions {
  maxDepth: number;
  maxSubfolders?: number;
}

interface Frame {
  node: FolderNode;
  next: number;
}

// Plain code-unit order so results do not depend on the host locale
function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// Symlinked files are followed; symlinked folders are not
async function isLinkedFile(folder: string, entry: Dirent): Promise<boolean> {
  const path = join(folder, entry.name);
  const target = await stat(path).catch(() => null);
  if (target?.isFile()) {
    return true;
  }
  logger.warn(`WARNING: Skipping symlink ${path} (${target ? 'not a file' : 'broken link'})`);
  return false;
}

async function populate(node: FolderNode, options: WalkOptions): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(node.path, { withFileTypes: true });
  } catch (error) {
    logger.warn(`WARNING: Cannot read directory ${node.path}: ${errorMessage(error)}`);
    return;
  }

  const fileNames: string[] = [];
  for (const entry of entries) {
    if (entry.isFile() || (entry.isSymbolicLink() && (await isLinkedFile(node.path, entry)))) {
      fileNames.push(entry.name);
    }
  }

  node.files = fileNames
    .sort(byName)
    .map((name) => join(node.path, name));

  if (node.depth >= options.maxDepth) {
    return;
  }

  let subfolders = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort(byName);

  if (node.depth === 0 && options.maxSubfolders !== undefined && subfolders.length > options.maxSubfolders) {
    logger.info(`Limiting to first ${options.maxSubfolders} of ${subfolders.length} subfolders`);
    subfolders = subfolders.slice(0, options.maxSubfolders);
  }

  node.children = subfolders.map((name) => ({
    path: join(node.path, name),
    depth: node.depth + 1,
    children: [],
    files: [],
  }));
}

/**
 * Walk `rootPath` and yield every folder after all of its descendants
 * (post-order). Each directory is read when the walk first reaches it.
 * Folders deeper than `maxDepth` are never read; the root has depth 0.
 */
export async function* walkDeepestFirst(rootPath: string, options: WalkOptions): AsyncGenerator<FolderNode> {
  const root: FolderNode = { path: rootPath, depth: 0, children: [], files: [] };
  await populate(root, options);

  const stack: Frame[] = [{ node: root, next: 0 }];
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.next < frame.node.children.length) {
      const child = frame.node.children[frame.next];
      frame.next++;
      await populate(child, options);
      stack.push({ node: child, next: 0 });
      continue;
    }

    stack.pop();
    yield frame.node;
  }
}
