/**
 * VestingEngine — cliff vesting grants.
 *
 * Nothing vests before `startTime + cliffDuration`; `cliffAmount` vests
 * at that instant and the remainder vests linearly until
 * `startTime + totalDuration`. Revocable grants can be revoked by their
 * grantor, which pays out what has vested and returns the rest.
 */

import type { AccountId } from "@cadence/types";
import type { EngineDeps } from "./engine.js";
import { ScheduleEngine } from "./engine.js";
import type { VestingParams, VestingSchedule } from "./types.js";
import { ScheduleError } from "./types.js";
import { validateVestingParams } from "./validation.js";

export class VestingEngine extends ScheduleEngine<VestingSchedule> {
  constructor(deps: EngineDeps<VestingSchedule>) {
    super("vesting", deps);
  }

  /**
   * Create a grant and escrow its total from the grantor. Unlike streams,
   * a grant may start in the past and may vest to the grantor itself.
   */
  create(grantor: AccountId, params: VestingParams): number {
    this.requireInitialized();
    this.authorizer.requireAuth(grantor);
    validateVestingParams(grantor, params);
    this.assertOpenParties(grantor, params.beneficiary);

    const now = this.clock.now();
    const grant: VestingSchedule = {
      kind: "vesting",
      id: this.repository.peekNextId(),
      sender: grantor,
      recipient: params.beneficiary,
      token: params.token,
      totalAmount: params.totalAmount,
      claimedAmount: 0n,
      startTime: params.startTime,
      cliffDuration: params.cliffDuration,
      cliffAmount: params.cliffAmount,
      totalDuration: params.totalDuration,
      label: params.label,
      revocable: params.revocable,
      status: "active",
      lastClaimTime: params.startTime,
      createdAt: now,
    };
    const correlationId = `vesting:${String(grant.id)}:create`;
    const event = this.prepareEvent("vesting.created", grantor, correlationId, {
      scheduleId: grant.id,
      grantor,
      beneficiary: grant.recipient,
      token: grant.token,
      totalAmount: grant.totalAmount.toString(),
      startTime: grant.startTime.toString(),
      cliffDuration: grant.cliffDuration.toString(),
      cliffAmount: grant.cliffAmount.toString(),
      totalDuration: grant.totalDuration.toString(),
      label: grant.label,
      revocable: grant.revocable,
    });
    this.escrowAndInsert(grantor, [grant], correlationId, event);
    return grant.id;
  }

  /**
   * Revoke a revocable grant: vested-but-unclaimed goes to the
   * beneficiary, the unvested remainder returns to the grantor, and the
   * grant's total is capped to what vested.
   *
   * @returns the unvested amount refunded
   * @throws ScheduleError UNAUTHORIZED if the grant is not revocable
   */
  revoke(grantor: AccountId, id: number): bigint {
    return this.terminate(grantor, id, (grant) => {
      if (!grant.revocable) {
        throw new ScheduleError("UNAUTHORIZED", `Vesting ${String(id)} is not revocable`);
      }
    });
  }

  schedulesByGrantor(account: AccountId): readonly number[] {
    return this.schedulesBySender(account);
  }

  schedulesByBeneficiary(account: AccountId): readonly number[] {
    return this.schedulesByRecipient(account);
  }
}
