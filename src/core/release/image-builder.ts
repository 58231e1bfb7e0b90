import { imageRef, LATEST, type ContainerEngine } from './engine'
import type { RetryExecutor } from './retry'
import type { BuildTarget, ReleaseContext } from '../../types/release'

export class ImageBuilder {
  constructor(
    private readonly engine: ContainerEngine,
    private readonly retry: RetryExecutor,
    private readonly buildArg: string
  ) {}

  /**
   * Pull the current `latest` as cache, build `latest` and `<tag>`, push both.
   * Each step is retried on its own; a step that fails twice throws and nothing after it runs.
   */
  async buildAndPush(target: BuildTarget, context: ReleaseContext): Promise<void> {
    const latest: string = imageRef(target.image, LATEST)
    const tagged: string = imageRef(target.image, context.tag)
    await this.retry.execute(`pull ${latest}`, () => this.engine.pull(latest))
    await this.retry.execute(`build ${tagged}`, () => this.engine.build({
      image: target.image,
      tag: context.tag,
      dockerfilePath: target.dockerfilePath,
      context: target.context,
      buildArg: this.buildArg
    }))
    await this.retry.execute(`push ${tagged}`, () => this.engine.push(tagged))
    await this.retry.execute(`push ${latest}`, () => this.engine.push(latest))
  }
}
