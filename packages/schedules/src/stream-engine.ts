/**
 * StreamEngine — continuous linear salary streams.
 *
 * A stream escrows its whole total at creation and releases it linearly
 * from startTime to endTime. The sender can cancel at any time: what
 * has accrued goes to the recipient, the rest comes back.
 */

import type { AccountId } from "@cadence/types";
import type { EngineDeps } from "./engine.js";
import { ScheduleEngine } from "./engine.js";
import type { StreamParams, StreamSchedule } from "./types.js";
import { ScheduleError } from "./types.js";
import { validateStreamParams } from "./validation.js";

export class StreamEngine extends ScheduleEngine<StreamSchedule> {
  constructor(deps: EngineDeps<StreamSchedule>) {
    super("stream", deps);
  }

  /**
   * Create a stream and escrow its total from the sender.
   *
   * @returns the new stream id
   * @throws ScheduleError on invalid parameters; LedgerError INSUFFICIENT_BALANCE
   */
  create(sender: AccountId, params: StreamParams): number {
    this.requireInitialized();
    this.authorizer.requireAuth(sender);
    const now = this.clock.now();
    validateStreamParams(sender, params, now);
    this.assertOpenParties(sender, params.recipient);

    const stream = this.build(this.repository.peekNextId(), sender, params, now);
    const correlationId = `stream:${String(stream.id)}:create`;
    const event = this.prepareEvent("stream.created", sender, correlationId, {
      scheduleId: stream.id,
      sender,
      recipient: stream.recipient,
      token: stream.token,
      totalAmount: stream.totalAmount.toString(),
      startTime: stream.startTime.toString(),
      endTime: stream.endTime.toString(),
    });
    this.escrowAndInsert(sender, [stream], correlationId, event);
    return stream.id;
  }

  /**
   * Create several streams from one sender. Every entry is validated
   * before anything is escrowed; one bad entry rejects the whole batch
   * and consumes no ids.
   *
   * @returns ids in the order of `batch`
   */
  createBatch(sender: AccountId, batch: readonly StreamParams[]): readonly number[] {
    this.requireInitialized();
    this.authorizer.requireAuth(sender);
    if (batch.length === 0) {
      throw new ScheduleError("INVALID_SCHEDULE", "A batch must contain at least one stream");
    }

    const now = this.clock.now();
    for (const params of batch) {
      validateStreamParams(sender, params, now);
      this.assertOpenParties(sender, params.recipient);
    }
    this.repository.peekNextId(batch.length - 1);

    const streams = batch.map((params, i) =>
      this.build(this.repository.peekNextId(i), sender, params, now),
    );
    const ids = streams.map((s) => s.id);
    const correlationId = `stream:batch:${String(ids[0])}`;
    const totalAmount = streams.reduce((sum, s) => sum + s.totalAmount, 0n);
    const event = this.prepareEvent("stream.batch_created", sender, correlationId, {
      scheduleIds: ids,
      sender,
      totalAmount: totalAmount.toString(),
    });
    this.escrowAndInsert(sender, streams, correlationId, event);
    return ids;
  }

  /**
   * Stop the stream now, settle what accrued and refund the rest.
   *
   * @returns the amount refunded to the sender
   */
  cancel(sender: AccountId, id: number): bigint {
    return this.terminate(sender, id);
  }

  private build(
    id: number,
    sender: AccountId,
    params: StreamParams,
    now: bigint,
  ): StreamSchedule {
    return {
      kind: "stream",
      id,
      sender,
      recipient: params.recipient,
      token: params.token,
      totalAmount: params.totalAmount,
      claimedAmount: 0n,
      startTime: params.startTime,
      endTime: params.endTime,
      status: "active",
      lastClaimTime: params.startTime,
      createdAt: now,
    };
  }
}
