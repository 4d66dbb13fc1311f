import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { stringify as stringifyYaml } from 'yaml';
import { ErrorCode } from '@reelsmith/core';
import { loadProject } from './project-loader.js';

describe('project-loader', () => {
  let workdir: string;

  beforeEach(async () => {
    workdir = await mkdtemp(join(tmpdir(), 'reelsmith-project-'));
  });

  afterEach(async () => {
    await rm(workdir, { recursive: true, force: true });
  });

  async function writeProject(content: unknown): Promise<string> {
    const projectPath = join(workdir, 'project.yaml');
    await writeFile(projectPath, typeof content === 'string' ? content : stringifyYaml(content), 'utf8');
    return projectPath;
  }

  it('resolves relative paths against the project file', async () => {
    const projectPath = await writeProject({
      output: 'out/final.mp4',
      avatar: 'brand/avatar.mp4',
      footage: 'library',
      seed: 7,
      scenes: [
        { narration: 'Hook.', audio: 'voice/0.wav', primary: 'clips/a.mp4' },
        { narration: 'Fact.', audio: '/abs/voice/1.wav', keywords: ['octopus'] },
      ],
      compose: { transitions: { overlapMs: 400 }, captions: { enabled: true, fontFile: 'fonts/Bold.ttf' } },
    });

    const project = await loadProject(projectPath);

    expect(project).toEqual({
      projectPath,
      outputPath: join(workdir, 'out/final.mp4'),
      workDir: join(workdir, 'out/.final-work'),
      avatarPath: join(workdir, 'brand/avatar.mp4'),
      footageDir: join(workdir, 'library'),
      seed: 7,
      cleanWorkDir: false,
      scenes: [
        { narration: 'Hook.', audio: join(workdir, 'voice/0.wav'), primary: join(workdir, 'clips/a.mp4') },
        { narration: 'Fact.', audio: '/abs/voice/1.wav', keywords: ['octopus'] },
      ],
      compose: {
        transitions: { overlapMs: 400 },
        captions: { enabled: true, fontFile: join(workdir, 'fonts/Bold.ttf') },
      },
    });
  });

  it('honours an explicit work directory', async () => {
    const projectPath = await writeProject({
      output: 'final.mp4',
      workDir: 'cache',
      cleanWorkDir: true,
      scenes: [{ narration: 'Only.', audio: 'voice.wav' }],
    });

    const project = await loadProject(projectPath);

    expect(project.workDir).toBe(join(workdir, 'cache'));
    expect(project.cleanWorkDir).toBe(true);
  });

  it('rejects a project without scenes', async () => {
    const projectPath = await writeProject({ output: 'final.mp4', scenes: [] });

    await expect(loadProject(projectPath)).rejects.toMatchObject({
      code: ErrorCode.INVALID_PROJECT,
      message: 'Invalid project file: /scenes must NOT have fewer than 1 items',
    });
  });

  it('rejects unknown scene fields', async () => {
    const projectPath = await writeProject({
      output: 'final.mp4',
      scenes: [{ narration: 'Hi.', audio: 'a.wav', voice: 'alloy' }],
    });

    await expect(loadProject(projectPath)).rejects.toMatchObject({
      code: ErrorCode.INVALID_PROJECT,
      message: 'Invalid project file: /scenes/0 must NOT have additional properties',
    });
  });

  it('reports malformed YAML', async () => {
    const projectPath = await writeProject('output: [unclosed\n');

    await expect(loadProject(projectPath)).rejects.toMatchObject({ code: ErrorCode.INVALID_PROJECT });
  });

  it('reports a missing file', async () => {
    await expect(loadProject(join(workdir, 'absent.yaml'))).rejects.toMatchObject({
      code: ErrorCode.INVALID_PROJECT,
      context: join(workdir, 'absent.yaml'),
    });
  });
});
