import { resolve } from 'node:path';
import {
  composeVideo,
  createSeededRandom,
  mathRandomSource,
  planComposition,
  resolveComposeConfig,
  type ComposeDependencies,
  type ComposeProgressEvent,
  type ComposeRequest,
  type ComposeResult,
  type CompositionPlan,
  type Logger,
  type MediaTool,
} from '@reelsmith/core';
import {
  createFfmpegMediaTool,
  createFileFootageSource,
  createFileVoiceSource,
} from '@reelsmith/providers';
import { loadProject, type LoadedProject } from '../lib/project-loader.js';

export interface ComposeCommandOptions {
  projectPath: string;
  /** Replaces the project's output path; relative to the working directory */
  outputPath?: string;
  seed?: number;
  concurrency?: number;
  dryRun?: boolean;
  /** Remove the work directory after a successful export */
  clean?: boolean;
  ffmpegPath?: string;
  ffprobePath?: string;
  logger?: Partial<Logger>;
  onProgress?: (event: ComposeProgressEvent) => void;
  /** Replaces the FFmpeg-backed tool */
  mediaTool?: MediaTool;
}

export type ComposeCommandResult =
  | { kind: 'plan'; project: LoadedProject; plan: CompositionPlan }
  | { kind: 'composed'; project: LoadedProject; result: ComposeResult };

export async function runCompose(options: ComposeCommandOptions): Promise<ComposeCommandResult> {
  const logger = options.logger ?? {};
  const project = await loadProject(options.projectPath);
  const config = resolveComposeConfig({
    ...project.compose,
    concurrency: options.concurrency ?? project.compose.concurrency,
  });

  const tool =
    options.mediaTool ??
    createFfmpegMediaTool({
      config: {
        ffmpegPath: options.ffmpegPath ?? process.env.REELSMITH_FFMPEG_PATH ?? 'ffmpeg',
        ffprobePath: options.ffprobePath ?? process.env.REELSMITH_FFPROBE_PATH ?? 'ffprobe',
      },
      logger,
    });

  const seed = options.seed ?? project.seed;
  const deps: ComposeDependencies = {
    tool,
    voice: createFileVoiceSource(tool),
    footage: createFileFootageSource({ tool, footageDir: project.footageDir, logger }),
    random: seed === undefined ? mathRandomSource : createSeededRandom(seed),
    logger,
    onProgress: options.onProgress,
  };

  const request: ComposeRequest = {
    scenes: project.scenes,
    outputPath: options.outputPath ? resolve(options.outputPath) : project.outputPath,
    workDir: project.workDir,
    avatarPath: project.avatarPath,
    config,
    cleanWorkDir: options.clean ?? project.cleanWorkDir,
  };

  logger.debug?.('cli.compose.request', {
    projectPath: project.projectPath,
    outputPath: request.outputPath,
    workDir: request.workDir,
    scenes: request.scenes.length,
    seed,
    dryRun: Boolean(options.dryRun),
  });

  if (options.dryRun) {
    return { kind: 'plan', project, plan: await planComposition(request, deps) };
  }
  return { kind: 'composed', project, result: await composeVideo(request, deps) };
}
