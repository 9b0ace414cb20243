/** Raised when closing a milestone that does not exist. */
export class NoMilestoneFoundError extends Error {
  public readonly title: string

  /**
   * Creates a new NoMilestoneFoundError.
   *
   * @param title - Milestone title that was searched for.
   */
  public constructor(title: string) {
    super(`no milestone found: ${title}`)
    this.name = 'NoMilestoneFoundError'
    this.title = title
  }
}
