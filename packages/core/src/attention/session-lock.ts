/**
 * Single-flight guard for one session. The owner id is set exactly while the
 * lock is held, so "held" and "has an owner" can never disagree.
 */
export class SessionLock {
  private ownerSenderId: string | undefined;

  get held(): boolean {
    return this.ownerSenderId !== undefined;
  }

  get owner(): string | undefined {
    return this.ownerSenderId;
  }

  /** Take the lock for `senderId`. Returns false when it is already held. */
  tryAcquire(senderId: string): boolean {
    if (this.ownerSenderId !== undefined) {
      return false;
    }

    this.ownerSenderId = senderId;
    return true;
  }

  release(): void {
    this.ownerSenderId = undefined;
  }
}
