import { getAddress } from "ethers";
import type { TransactionReceipt } from "../Environment.js";
import { CCIPRouterMock, type SentMessage } from "./CCIPRouterMock.js";

export type DeliveryResult =
  | { messageId: string; success: true; receipt: TransactionReceipt }
  | { messageId: string; success: false; error: unknown };

/**
 * Carries messages between routers of different environments.
 *
 * Delivery is explicit so tests decide ordering and duplication. A message
 * whose execution reverts stays pending and can be executed again, as with
 * manual execution on a live network.
 */
export class CCIPRelay {
  private readonly routers = new Map<bigint, CCIPRouterMock>();
  private readonly delivered = new Map<string, number>();
  readonly operator: string;

  constructor(operator: string) {
    this.operator = getAddress(operator);
  }

  connect(...routers: CCIPRouterMock[]): this {
    for (const router of routers) {
      if (this.routers.has(router.chainSelector)) {
        throw new Error(`Router already connected for chain ${router.chainSelector}`);
      }
      this.routers.set(router.chainSelector, router);
    }
    return this;
  }

  /** Every message accepted by a connected router, in per-router send order. */
  sent(): SentMessage[] {
    return [...this.routers.values()].flatMap((router) => router.sentMessages());
  }

  pending(): SentMessage[] {
    return this.sent().filter((message) => !this.delivered.has(message.messageId));
  }

  deliveryCount(messageId: string): number {
    return this.delivered.get(messageId) ?? 0;
  }

  deliver(messageId: string): DeliveryResult {
    const message = this.find(messageId);
    if (this.delivered.has(messageId)) {
      throw new Error(`Message ${messageId} was already delivered; use redeliver()`);
    }
    return this.execute(message);
  }

  /** Executes an already delivered message again (at-least-once delivery). */
  redeliver(messageId: string): DeliveryResult {
    return this.execute(this.find(messageId));
  }

  deliverAll(): DeliveryResult[] {
    return this.pending().map((message) => this.execute(message));
  }

  private find(messageId: string): SentMessage {
    const message = this.sent().find((candidate) => candidate.messageId === messageId);
    if (message === undefined) throw new Error(`Unknown message ${messageId}`);
    return message;
  }

  private execute(message: SentMessage): DeliveryResult {
    const destination = this.routers.get(message.destinationChainSelector);
    if (destination === undefined) {
      throw new Error(`No router connected for chain ${message.destinationChainSelector}`);
    }
    try {
      const receipt = destination.routeMessage(
        {
          messageId: message.messageId,
          sourceChainSelector: message.sourceChainSelector,
          sender: CCIPRouterMock.encodeSender(message.sender),
          data: message.data,
          destTokenAmounts: [],
        },
        CCIPRouterMock.receiverAddress(message),
        { from: this.operator },
      );
      this.delivered.set(message.messageId, this.deliveryCount(message.messageId) + 1);
      return { messageId: message.messageId, success: true, receipt };
    } catch (error) {
      return { messageId: message.messageId, success: false, error };
    }
  }
}
