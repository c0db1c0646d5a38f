import { ProtocolError } from '../../shared/errors';

/**
 * Non-reentrant lock held for the whole of a fund-moving call.
 * A custody callback that re-enters the same component is rejected.
 */
export class ReentrancyGuard {
  private entered = false;

  constructor(private readonly component: string) {}

  async run<T>(work: () => Promise<T>): Promise<T> {
    if (this.entered) {
      throw new ProtocolError('REENTRANT_CALL', `${this.component}: reentrant call rejected`);
    }

    this.entered = true;
    try {
      return await work();
    } finally {
      this.entered = false;
    }
  }

  isEntered(): boolean {
    return this.entered;
  }
}
