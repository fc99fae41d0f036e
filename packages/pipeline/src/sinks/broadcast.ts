import { FifoQueue } from '../fifo-queue'

interface Branch<T> {
  readonly buffer: FifoQueue<T>
  detached: boolean
}

/**
 * Splits one lazy sequence into `count` independent ones that share a single
 * upstream pass.
 *
 * A branch that asks for an item while its buffer is empty triggers one upstream
 * pull; the item is appended to every attached branch, so each branch sees every
 * item in upstream order at its own pace. Buffers are unbounded: a slow branch
 * holds everything a faster one has already consumed. A branch whose consumer
 * stops is detached and its buffer dropped; once all branches are detached the
 * upstream sequence is closed. An upstream failure is re-thrown on every branch.
 */
export const broadcast = <T>(source: AsyncIterable<T>, count: number): AsyncIterable<T>[] => {
  if (!Number.isInteger(count) || count <= 0) {
    throw new Error('count must be a positive integer')
  }

  const branches: Branch<T>[] = Array.from({ length: count }, () => ({
    buffer: new FifoQueue<T>(),
    detached: false,
  }))
  let upstream: AsyncIterator<T> | null = null
  let inFlight: Promise<void> | null = null
  let finished = false
  let failure: { error: unknown } | null = null

  const pullOnce = (): Promise<void> => {
    if (inFlight == null) {
      upstream ??= source[Symbol.asyncIterator]()
      inFlight = upstream.next().then(
        (result) => {
          inFlight = null
          if (result.done === true) {
            finished = true
            return
          }
          for (const branch of branches) {
            if (!branch.detached) {
              branch.buffer.push(result.value)
            }
          }
        },
        (error: unknown) => {
          inFlight = null
          finished = true
          failure = { error }
        }
      )
    }
    return inFlight
  }

  const detach = async (branch: Branch<T>): Promise<void> => {
    if (branch.detached) {
      return
    }
    branch.detached = true
    branch.buffer.clear()
    if (finished || upstream == null || branches.some((other) => !other.detached)) {
      return
    }
    finished = true
    await upstream.return?.()
  }

  const toIterable = (branch: Branch<T>): AsyncIterable<T> => ({
    [Symbol.asyncIterator]: (): AsyncIterator<T> => ({
      next: async (): Promise<IteratorResult<T>> => {
        while (!branch.detached) {
          if (branch.buffer.length > 0) {
            return { value: branch.buffer.shift(), done: false }
          }
          if (finished) {
            if (failure != null) {
              throw failure.error
            }
            break
          }
          await pullOnce()
        }
        return { value: undefined, done: true }
      },
      return: async (): Promise<IteratorResult<T>> => {
        await detach(branch)
        return { value: undefined, done: true }
      },
    }),
  })

  return branches.map(toIterable)
}
