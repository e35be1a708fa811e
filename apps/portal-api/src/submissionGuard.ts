import {conflict} from './errors'

export type SubmissionKey = {
  actor: string
  operation: string
  subject: string
}

const toKey = ({actor, operation, subject}: SubmissionKey) => JSON.stringify([actor, operation, subject.toLowerCase()])

/**
 * Rejects a second identical request while the first is still in flight. With the
 * guard disabled every request runs and produces its own certificate.
 */
export class SubmissionGuard {
  private readonly inFlight = new Set<string>()

  public constructor(private readonly options: {enabled: boolean}) {}

  public get enabled() {
    return this.options.enabled
  }

  public async run<T>(key: SubmissionKey, operation: () => Promise<T>): Promise<T> {
    if (!this.options.enabled) {
      return operation()
    }

    const serialized = toKey(key)
    if (this.inFlight.has(serialized)) {
      throw conflict('issuance_in_progress', 'An identical request is already being processed')
    }

    this.inFlight.add(serialized)
    try {
      return await operation()
    } finally {
      this.inFlight.delete(serialized)
    }
  }

  public get size() {
    return this.inFlight.size
  }
}
