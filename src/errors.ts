/**
 * A fatal failure of one named setup step.
 *
 * The message is the diagnostic shown to the user, e.g.
 * `Failed to download mdbook: The process '/usr/bin/curl' failed with exit code 22`.
 */
export class SetupError extends Error {
  readonly step: string

  constructor(step: string, cause?: unknown) {
    super(
      cause === undefined
        ? `Failed to ${step}`
        : `Failed to ${step}: ${describe(cause)}`
    )
    this.name = 'SetupError'
    this.step = step
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}

/**
 * Run one step, rethrowing any failure as a SetupError naming the step
 */
export async function withStep<T>(
  step: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    if (error instanceof SetupError) throw error
    throw new SetupError(step, error)
  }
}
