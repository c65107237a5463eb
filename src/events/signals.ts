export type Receiver<T> = (payload: T) => Promise<void> | void

/**
 * Synchronous-dispatch signal: `send` awaits every connected receiver in
 * connection order and lets the first failure propagate to the sender.
 */
export class Signal<T> {
  private receivers: Receiver<T>[] = []

  connect(receiver: Receiver<T>): () => void {
    this.receivers.push(receiver)
    return () => {
      this.receivers = this.receivers.filter((candidate) => candidate !== receiver)
    }
  }

  async send(payload: T): Promise<void> {
    for (const receiver of [...this.receivers]) {
      await receiver(payload)
    }
  }
}

export type AuthSignalPayload = {
  ip: string | null
  username: string | null
}

export const userLoggedIn = new Signal<AuthSignalPayload>()
export const userLoggedOut = new Signal<AuthSignalPayload>()
export const userLoginFailed = new Signal<AuthSignalPayload>()
