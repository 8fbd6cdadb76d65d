import type { TagSet } from '../contracts/sink.js'

const NO_BRICK_TAGS: TagSet = Object.freeze({})

/**
 * Tracks the brick a volume report is currently describing.
 *
 * A fresh instance starts without tags; the first brick header sets them and every
 * later header replaces them.
 */
export class BrickContext {
  private readonly volume: string
  private current: TagSet = NO_BRICK_TAGS

  public constructor(volume: string) {
    this.volume = volume
  }

  /**
   * Switches to a new brick.
   *
   * @param brick Brick identifier taken verbatim from the header line.
   * @returns Tag set used for the following lines.
   */
  public enterBrick(brick: string): TagSet {
    this.current = { volume: this.volume, brick }
    return this.current
  }

  public get tags(): TagSet {
    return this.current
  }
}
