import { Logger } from './logger.js';

export type RequestId = string | number;

export interface RequestContext {
  requestId: RequestId;
  abortController: AbortController;
  startTime: number;
  toolName?: string;
}

/**
 * Tracks in-flight MCP tool calls so cancellation notifications can abort
 * the backend request behind them.
 */
export class RequestTracker {
  private activeRequests: Map<RequestId, RequestContext>;
  private logger: Logger;

  constructor(logger: Logger) {
    this.activeRequests = new Map();
    this.logger = logger;
  }

  /**
   * Register a new tool call for tracking
   */
  registerRequest(requestId: RequestId, toolName?: string): RequestContext {
    const existing = this.activeRequests.get(requestId);
    if (existing) {
      this.logger.warn('REQUEST_DUPLICATE', 'Request ID already registered', {
        requestId,
        toolName
      });
      return existing;
    }

    const context: RequestContext = {
      requestId,
      abortController: new AbortController(),
      startTime: Date.now(),
      toolName
    };
    this.activeRequests.set(requestId, context);

    this.logger.debug('REQUEST_REGISTERED', 'Tool call registered for tracking', {
      requestId,
      toolName,
      activeRequestCount: this.activeRequests.size
    });

    return context;
  }

  getRequest(requestId: RequestId): RequestContext | undefined {
    return this.activeRequests.get(requestId);
  }

  /**
   * Abort a tracked call. Returns false when it is unknown or already aborted.
   */
  cancelRequest(requestId: RequestId, reason?: string): boolean {
    const context = this.activeRequests.get(requestId);

    if (!context) {
      this.logger.debug('CANCEL_REQUEST_NOT_FOUND', 'Request not found for cancellation', {
        requestId,
        reason
      });
      return false;
    }

    if (context.abortController.signal.aborted) {
      return false;
    }

    context.abortController.abort(reason);

    this.logger.info('REQUEST_CANCELLED', 'Request cancelled', {
      requestId,
      reason,
      duration_ms: Date.now() - context.startTime,
      toolName: context.toolName
    });

    this.cleanup(requestId);
    return true;
  }

  cleanup(requestId: RequestId): void {
    const context = this.activeRequests.get(requestId);
    if (!context) {
      return;
    }

    this.activeRequests.delete(requestId);
    this.logger.debug('REQUEST_CLEANUP', 'Request cleaned up', {
      requestId,
      duration_ms: Date.now() - context.startTime,
      toolName: context.toolName,
      remainingRequests: this.activeRequests.size
    });
  }

  isActive(requestId: RequestId): boolean {
    const context = this.activeRequests.get(requestId);
    return !!context && !context.abortController.signal.aborted;
  }

  getActiveRequestIds(): RequestId[] {
    return Array.from(this.activeRequests.keys());
  }

  /**
   * Abort and forget calls older than `maxAgeMs`
   */
  cleanupStaleRequests(maxAgeMs: number = 300000): number {
    const now = Date.now();
    let cleanedCount = 0;

    for (const [requestId, context] of this.activeRequests.entries()) {
      const age = now - context.startTime;
      if (age <= maxAgeMs) continue;

      this.logger.warn('REQUEST_STALE', 'Cleaning up stale request', {
        requestId,
        age_ms: age,
        toolName: context.toolName
      });
      if (!context.abortController.signal.aborted) {
        context.abortController.abort('Request timed out');
      }
      this.cleanup(requestId);
      cleanedCount++;
    }

    return cleanedCount;
  }

  shutdown(): void {
    this.logger.info('REQUEST_TRACKER_SHUTDOWN', 'Shutting down request tracker', {
      activeRequests: this.activeRequests.size
    });

    for (const context of this.activeRequests.values()) {
      if (!context.abortController.signal.aborted) {
        context.abortController.abort('Server shutting down');
      }
    }
    this.activeRequests.clear();
  }
}
