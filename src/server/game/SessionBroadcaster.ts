import type { CommandData, ExecutionResult } from '../../shared/types/command';
import type { ServerDelivery } from '../../shared/types/websocket';
import { buildBroadcastMessage, buildResponseMessage, encodeEnvelope } from '../../shared/codec/envelopeCodec';
import { logger } from '../utils/logger';

/**
 * Delivers server → client emissions to a single connection.
 */
export interface Transport {
  deliver(connectionId: string, delivery: ServerDelivery): void;
}

export interface CommandOrigin {
  connectionId: string;
  clientId: string;
  sessionId: string;
}

export type CommandCorrelation = Pick<CommandData, 'timestamp' | 'pieceId' | 'kind'>;

export type CommandOutcome =
  | { accepted: true; command: CommandCorrelation; result: ExecutionResult }
  | { accepted: false; command: CommandCorrelation; code: string; message: string };

export interface OutboundMessage {
  connectionId: string;
  messageType: 'response' | 'broadcast';
  envelope: string;
}

export interface PublishReport {
  responses: number;
  broadcasts: number;
  /** Set when a broadcast was withheld because its version was not newer. */
  outOfOrder: boolean;
}

/**
 * Pure part of publishing: the RESPONSE for the originator and, only for an
 * accepted command, one BROADCAST per subscriber (the originator included).
 */
export function buildOutcomeMessages(
  outcome: CommandOutcome,
  origin: CommandOrigin,
  subscribers: readonly string[]
): OutboundMessage[] {
  const response = buildResponseMessage(
    outcome.command,
    outcome.accepted
      ? { success: true, executionResult: outcome.result, errorMessage: null, errorCode: null }
      : { success: false, executionResult: null, errorMessage: outcome.message, errorCode: outcome.code },
    origin.clientId,
    origin.sessionId
  );

  const messages: OutboundMessage[] = [
    { connectionId: origin.connectionId, messageType: 'response', envelope: encodeEnvelope(response) },
  ];

  if (outcome.accepted) {
    const envelope = encodeEnvelope(buildBroadcastMessage(outcome.command, outcome.result, origin.sessionId));
    for (const connectionId of subscribers) {
      messages.push({ connectionId, messageType: 'broadcast', envelope });
    }
  }

  return messages;
}

/**
 * Tracks who is subscribed to which session and fans command outcomes out to
 * them. Broadcasts for one session leave in strictly increasing version order.
 */
export class SessionBroadcaster {
  private readonly subscribersBySession = new Map<string, Set<string>>();
  private readonly lastBroadcastVersion = new Map<string, number>();

  constructor(private readonly transport: Transport) {}

  subscribe(sessionId: string, connectionId: string): boolean {
    let subscribers = this.subscribersBySession.get(sessionId);
    if (!subscribers) {
      subscribers = new Set();
      this.subscribersBySession.set(sessionId, subscribers);
    }
    if (subscribers.has(connectionId)) {
      return false;
    }
    subscribers.add(connectionId);
    return true;
  }

  unsubscribe(sessionId: string, connectionId: string): boolean {
    const subscribers = this.subscribersBySession.get(sessionId);
    if (!subscribers || !subscribers.delete(connectionId)) {
      return false;
    }
    if (subscribers.size === 0) {
      this.subscribersBySession.delete(sessionId);
    }
    return true;
  }

  /**
   * Drop a connection from every session. Returns the sessions it left.
   */
  removeConnection(connectionId: string): string[] {
    const left: string[] = [];
    for (const sessionId of Array.from(this.subscribersBySession.keys())) {
      if (this.unsubscribe(sessionId, connectionId)) {
        left.push(sessionId);
      }
    }
    return left;
  }

  isSubscribed(sessionId: string, connectionId: string): boolean {
    return this.subscribersBySession.get(sessionId)?.has(connectionId) ?? false;
  }

  subscribers(sessionId: string): string[] {
    return Array.from(this.subscribersBySession.get(sessionId) ?? []);
  }

  /**
   * Forget the session's subscribers and broadcast ordering. Returns the
   * connections that were subscribed.
   */
  clearSession(sessionId: string): string[] {
    const former = this.subscribers(sessionId);
    this.subscribersBySession.delete(sessionId);
    this.lastBroadcastVersion.delete(sessionId);
    return former;
  }

  lastVersion(sessionId: string): number | undefined {
    return this.lastBroadcastVersion.get(sessionId);
  }

  publish(outcome: CommandOutcome, origin: CommandOrigin): PublishReport {
    let outOfOrder = false;

    if (outcome.accepted) {
      const last = this.lastBroadcastVersion.get(origin.sessionId);
      if (last !== undefined && outcome.result.version <= last) {
        logger.error('Refusing out-of-order broadcast', {
          sessionId: origin.sessionId,
          version: outcome.result.version,
          lastVersion: last,
          pieceId: outcome.command.pieceId,
        });
        outOfOrder = true;
      } else {
        this.lastBroadcastVersion.set(origin.sessionId, outcome.result.version);
      }
    }

    const messages = buildOutcomeMessages(
      outcome,
      origin,
      outOfOrder ? [] : this.subscribers(origin.sessionId)
    );

    const report: PublishReport = { responses: 0, broadcasts: 0, outOfOrder };
    for (const message of messages) {
      try {
        this.transport.deliver(message.connectionId, { event: 'message', payload: message.envelope });
        if (message.messageType === 'response') {
          report.responses += 1;
        } else {
          report.broadcasts += 1;
        }
      } catch (error) {
        logger.warn('Failed to deliver message', {
          sessionId: origin.sessionId,
          connectionId: message.connectionId,
          messageType: message.messageType,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return report;
  }

  /**
   * Emit an arbitrary delivery to every subscriber of a session.
   */
  notifySession(sessionId: string, delivery: ServerDelivery, connectionIds = this.subscribers(sessionId)): number {
    let delivered = 0;
    for (const connectionId of connectionIds) {
      try {
        this.transport.deliver(connectionId, delivery);
        delivered += 1;
      } catch (error) {
        logger.warn('Failed to notify connection', {
          sessionId,
          connectionId,
          event: delivery.event,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return delivered;
  }
}
