/**
 * Image release workflow
 *
 * Login check, build, registry tag and an optional push, in that order. The
 * first failing step stops the workflow and its exit code is returned.
 */

import path from 'node:path';
import { buildImage } from '../tools/build-image/index.js';
import { pushImage } from '../tools/push-image/index.js';
import { checkRegistryLogin } from '../tools/registry-login/index.js';
import { tagImage } from '../tools/tag-image/index.js';
import { engineFailure, engineSuccess, type EngineResult, type ToolContext } from '../tools/types.js';
import { findImage } from './image-catalog.js';

export interface ImageReleaseParams {
  image: string;
  version: string;
  tag: string;
  registry: string;
  /** Push without asking */
  force: boolean;
  /** Directory holding `images/`; defaults to the working directory */
  contextRoot?: string;
}

export interface ImageReleaseOutcome {
  localRef: string;
  registryRef: string;
  pushed: boolean;
}

export interface ImageReleaseHooks {
  confirmPush: () => Promise<boolean>;
  report: (line: string) => void;
}

export const PUSH_QUESTION = 'Do you want to push the image to the registry? (y/N): ';

/**
 * Only an answer starting with y or Y means yes
 */
export function isAffirmative(answer: string | undefined): boolean {
  return answer !== undefined && /^[Yy]/.test(answer.trim());
}

export async function releaseImage(
  params: ImageReleaseParams,
  context: ToolContext,
  hooks: ImageReleaseHooks,
): Promise<EngineResult<ImageReleaseOutcome>> {
  const definition = findImage(params.image);
  if (!definition.ok) {
    return engineFailure(definition.error);
  }

  const { name, title, repo, contextDir, buildArgs } = definition.value;
  const { version, tag, registry } = params;
  const root = params.contextRoot ?? context.cwd ?? process.cwd();

  hooks.report(`Building ${title} image...`);
  hooks.report(`MCP Server Version: ${version}`);
  hooks.report(`Image Tag: ${tag}`);
  hooks.report(`Registry: ${registry}`);

  hooks.report('Checking registry authentication...');
  const login = await checkRegistryLogin({ registry }, context);
  if (!login.ok) {
    return engineFailure(login.error, login.exitCode);
  }
  hooks.report(`✅ Logged in to ${registry}`);

  const built = await buildImage(
    { image: name, version, tag, repo, contextDir: path.join(root, contextDir), buildArgs },
    context,
  );
  if (!built.ok) {
    return engineFailure(built.error, built.exitCode);
  }
  hooks.report(`Image built successfully: ${built.value.localRef}`);

  const registryRef = `${registry}/${name}:${tag}`;
  const tagged = await tagImage({ source: built.value.localRef, target: registryRef }, context);
  if (!tagged.ok) {
    return engineFailure(tagged.error, tagged.exitCode);
  }
  hooks.report(`Image tagged for registry: ${registryRef}`);

  const shouldPush = params.force || (await hooks.confirmPush());
  if (!shouldPush) {
    hooks.report(`Image ready for manual push: ${context.engine} push ${registryRef}`);
    return engineSuccess({ localRef: built.value.localRef, registryRef, pushed: false });
  }

  hooks.report('Pushing image to registry...');
  const pushed = await pushImage({ imageRef: registryRef }, context);
  if (!pushed.ok) {
    return engineFailure(pushed.error, pushed.exitCode);
  }
  hooks.report('Image pushed successfully!');
  return engineSuccess({ localRef: built.value.localRef, registryRef, pushed: true });
}
