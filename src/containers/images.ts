import path from 'path';
import { HarnessError, HarnessErrorCode } from '../shared/errors.js';
import { componentLogger } from '../shared/logger.js';
import type { HarnessConfig } from '../config/types.js';
import type { DockerCli } from './docker.js';

const log = componentLogger('images');

/**
 * Builds the service and driver images at most once per run. An image with no
 * Dockerfile configured is expected to exist already. Only the build outcome is
 * memoized: each call brings its own DockerCli, so a retry after a failure runs
 * under the caller's runner and deadline.
 */
export class ImageBuilder {
  private built: Promise<void> | null = null;

  constructor(private readonly config: HarnessConfig) {}

  ensureBuilt(docker: DockerCli): Promise<void> {
    if (!this.built) {
      this.built = this.buildAll(docker).catch(err => {
        this.built = null;
        throw err;
      });
    }
    return this.built;
  }

  rebuild(docker: DockerCli): Promise<void> {
    this.built = null;
    return this.ensureBuilt(docker);
  }

  private async buildAll(docker: DockerCli): Promise<void> {
    if (!(await docker.available())) {
      throw new HarnessError(HarnessErrorCode.ENVIRONMENT_UNAVAILABLE, 'No container engine reachable (docker info failed)');
    }
    const { containers, projectRoot } = this.config;
    const images: Array<[string, string | null]> = [
      [containers.serviceImage, containers.serviceDockerfile],
      [containers.driverImage, containers.driverDockerfile],
    ];
    for (const [tag, dockerfile] of images) {
      if (!dockerfile) continue;
      const start = Date.now();
      try {
        await docker.build(tag, path.resolve(projectRoot, dockerfile), projectRoot);
      } catch (err) {
        throw new HarnessError(HarnessErrorCode.IMAGE_BUILD_FAILED, `Failed to build image ${tag}`, { dockerfile }, { cause: err });
      }
      log.info({ tag, elapsedMs: Date.now() - start }, 'image built');
    }
  }
}

const builders = new Map<string, ImageBuilder>();

// One builder per project root, so every environment in a run shares the build.
export function imageBuilderFor(config: HarnessConfig): ImageBuilder {
  let builder = builders.get(config.projectRoot);
  if (!builder) {
    builder = new ImageBuilder(config);
    builders.set(config.projectRoot, builder);
  }
  return builder;
}
