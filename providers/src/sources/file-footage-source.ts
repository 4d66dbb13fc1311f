import { readdir } from 'node:fs/promises';
import path from 'node:path';
import {
  probeSecondaryFootage,
  type FootageSelection,
  type FootageSource,
  type Logger,
  type MediaTool,
  type SceneScript,
  type VideoAsset,
} from '@reelsmith/core';

const VIDEO_EXTENSIONS = new Set(['.mp4', '.mov', '.m4v', '.webm']);

export interface FileFootageSourceOptions {
  tool: Pick<MediaTool, 'probeVideo'>;
  /** Local library searched by keyword */
  footageDir?: string;
  logger?: Partial<Logger>;
}

export function keywordSlug(keyword: string): string {
  return keyword
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Library files whose name contains the keyword slug, in name order.
 */
export function matchKeyword(files: readonly string[], keyword: string): string[] {
  const slug = keywordSlug(keyword);
  if (!slug) {
    return [];
  }
  return files
    .filter((file) => path.basename(file, path.extname(file)).toLowerCase().includes(slug))
    .sort();
}

/**
 * Footage source over local files. Explicit `primary`/`secondary` paths win;
 * otherwise the scene's keywords are looked up in the footage library, the
 * first match becoming the primary and the next distinct match the secondary.
 * A secondary that cannot be decoded is dropped.
 */
export function createFileFootageSource(options: FileFootageSourceOptions): FootageSource {
  const { tool, footageDir } = options;
  const logger = options.logger ?? {};
  let library: Promise<string[]> | null = null;

  function listLibrary(): Promise<string[]> {
    if (!footageDir) {
      return Promise.resolve([]);
    }
    library ??= readdir(footageDir).then((entries) =>
      entries.filter((entry) => VIDEO_EXTENSIONS.has(path.extname(entry).toLowerCase()))
    );
    return library;
  }

  async function findKeywordClips(script: SceneScript): Promise<string[]> {
    if (!footageDir || !script.keywords?.length) {
      return [];
    }
    const files = await listLibrary();
    const found: string[] = [];
    for (const keyword of script.keywords) {
      for (const file of matchKeyword(files, keyword)) {
        const fullPath = path.join(footageDir, file);
        if (!found.includes(fullPath)) {
          found.push(fullPath);
        }
      }
    }
    return found;
  }

  return {
    async selectFootage(script: SceneScript, sceneIndex: number): Promise<FootageSelection> {
      const candidates = await findKeywordClips(script);
      const primaryPath = script.primary ?? candidates[0];
      const secondaryPath =
        script.secondary ?? candidates.find((candidate) => candidate !== primaryPath);

      logger.debug?.('footage.selected', { sceneIndex, primaryPath, secondaryPath });

      const [primary, secondary] = await Promise.all([
        primaryPath ? tool.probeVideo(primaryPath) : Promise.resolve(undefined),
        secondaryPath
          ? probeSecondaryFootage(tool, secondaryPath, sceneIndex, logger)
          : Promise.resolve(undefined),
      ]);
      return { primary, secondary };
    },

    resolveAvatar(avatarPath: string): Promise<VideoAsset> {
      return tool.probeVideo(avatarPath);
    },
  };
}
