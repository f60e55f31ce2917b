/**
 * Publish on every state change, and keep re-announcing while active so a consumer
 * that missed a message still sees the channel is live. A steady inactive state is
 * not repeated.
 */
export const shouldPublish = (active: boolean, lastPublishedActive: boolean): boolean =>
  active !== lastPublishedActive || active;

export class EdgeTrigger {
  private lastPublished = false;

  get lastPublishedActive(): boolean {
    return this.lastPublished;
  }

  /**
   * Returns true when this tick's reading must be published. The caller is expected to
   * attempt the publish; the result of that attempt does not matter here.
   */
  evaluate(active: boolean): boolean {
    if (!shouldPublish(active, this.lastPublished)) return false;
    this.lastPublished = active;
    return true;
  }
}
