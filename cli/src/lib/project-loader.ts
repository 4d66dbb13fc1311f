import { readFile } from 'node:fs/promises';
import { dirname, isAbsolute, parse, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  compileSchemaFile,
  createReelsmithError,
  ErrorCode,
  validateAgainstSchema,
  type ComposeConfigOverrides,
  type SceneScript,
} from '@reelsmith/core';

const PROJECT_SCHEMA_URL = new URL('../../schemas/project.schema.json', import.meta.url);

/**
 * Project file as authored. Paths may be relative to the file.
 */
export interface ProjectFile {
  output: string;
  workDir?: string;
  avatar?: string;
  footage?: string;
  seed?: number;
  cleanWorkDir?: boolean;
  scenes: SceneScript[];
  compose?: ComposeConfigOverrides;
}

export interface LoadedProject {
  projectPath: string;
  outputPath: string;
  workDir: string;
  avatarPath?: string;
  footageDir?: string;
  seed?: number;
  cleanWorkDir: boolean;
  /** Scenes with every path made absolute */
  scenes: SceneScript[];
  compose: ComposeConfigOverrides;
}

let validateProject: ReturnType<typeof compileSchemaFile<ProjectFile>> | null = null;

function resolveFrom(baseDir: string, target: string): string {
  return isAbsolute(target) ? target : resolve(baseDir, target);
}

function resolveOptional(baseDir: string, target: string | undefined): string | undefined {
  return target === undefined ? undefined : resolveFrom(baseDir, target);
}

/**
 * Reads a YAML project file, validates it and resolves its paths against the
 * file's directory.
 *
 * @throws ReelsmithError (INVALID_PROJECT)
 */
export async function loadProject(projectPath: string): Promise<LoadedProject> {
  const absolutePath = resolve(projectPath);
  let raw: string;
  try {
    raw = await readFile(absolutePath, 'utf8');
  } catch (error) {
    throw createReelsmithError(ErrorCode.INVALID_PROJECT, `Cannot read project file ${absolutePath}.`, {
      context: absolutePath,
      cause: error,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createReelsmithError(ErrorCode.INVALID_PROJECT, `Project file is not valid YAML: ${message}`, {
      context: absolutePath,
      cause: error,
    });
  }

  const validate = (validateProject ??= compileSchemaFile<ProjectFile>(PROJECT_SCHEMA_URL));
  if (!validate(parsed)) {
    const { messages } = validateAgainstSchema(validate, parsed);
    throw createReelsmithError(
      ErrorCode.INVALID_PROJECT,
      `Invalid project file: ${messages.join('; ')}`,
      { context: absolutePath }
    );
  }

  return resolveProjectPaths(parsed, absolutePath);
}

export function resolveProjectPaths(project: ProjectFile, projectPath: string): LoadedProject {
  const baseDir = dirname(projectPath);
  const outputPath = resolveFrom(baseDir, project.output);
  const fontFile = project.compose?.captions?.fontFile;

  return {
    projectPath,
    outputPath,
    workDir: project.workDir
      ? resolveFrom(baseDir, project.workDir)
      : resolve(dirname(outputPath), `.${parse(outputPath).name}-work`),
    avatarPath: resolveOptional(baseDir, project.avatar),
    footageDir: resolveOptional(baseDir, project.footage),
    seed: project.seed,
    cleanWorkDir: project.cleanWorkDir ?? false,
    scenes: project.scenes.map((scene) => ({
      ...scene,
      audio: resolveFrom(baseDir, scene.audio),
      primary: resolveOptional(baseDir, scene.primary),
      secondary: resolveOptional(baseDir, scene.secondary),
    })),
    compose: {
      ...project.compose,
      ...(fontFile
        ? { captions: { ...project.compose?.captions, fontFile: resolveFrom(baseDir, fontFile) } }
        : {}),
    },
  };
}
