export type InterruptReason = 'pause' | 'cancel';

/**
 * Cooperative stop request shared between the service and one running engine.
 * The first reason wins; aborting also tears down the in-flight request.
 */
export class TransferSignal {
  private readonly controller = new AbortController();
  private interruptReason: InterruptReason | null = null;

  get reason(): InterruptReason | null {
    return this.interruptReason;
  }

  get aborted(): boolean {
    return this.interruptReason !== null;
  }

  get abortSignal(): AbortSignal {
    return this.controller.signal;
  }

  interrupt(reason: InterruptReason): void {
    if (this.interruptReason !== null) {
      return;
    }
    this.interruptReason = reason;
    this.controller.abort();
  }
}

export interface TransferRequest {
  url: string;
  path: string;
  // Ignore any partial file and start at byte 0
  fresh?: boolean;
}

export interface TransferStart {
  // Offset the transfer continues from after negotiation
  resumeFrom: number;
  totalSize: number | null;
  // A partial file existed but had to be discarded
  restarted: boolean;
}

/**
 * Receives a running transfer's reports. Called from the engine's own
 * async flow, one call at a time.
 */
export interface TransferListener {
  onStart(info: TransferStart): void;
  onProgress(delta: number, totalSize: number | null): void;
}

export interface TransferOutcome {
  status: 'completed' | 'paused' | 'cancelled';
  downloaded: number;
  totalSize: number | null;
}

export interface TransferEngineOptions {
  chunkSize: number;
  // Connect timeout (ms)
  timeout: number;
  headers?: Record<string, string>;
}

export interface TransferEngine {
  /**
   * Resolves when the transfer completes or stops on a signal;
   * rejects with a TransferError on failure.
   */
  run(request: TransferRequest, listener: TransferListener, signal: TransferSignal): Promise<TransferOutcome>;
}
