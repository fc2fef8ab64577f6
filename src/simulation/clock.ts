/**
 * Simulation clock: slot → (day, hour).
 *
 * Owned by the orchestration loop; nothing else advances it.
 */

import type { SlotInfo } from '../types.js';

export class SimulationClock {
  private slot: number;
  private terminal: boolean;

  constructor(
    readonly slotsPerDay: number,
    readonly totalDays: number,
    startSlot = 0
  ) {
    if (!Number.isInteger(slotsPerDay) || slotsPerDay <= 0) {
      throw new Error(`slotsPerDay must be a positive integer, got ${slotsPerDay}`);
    }
    if (!Number.isInteger(totalDays) || totalDays < 0) {
      throw new Error(`totalDays must be a non-negative integer, got ${totalDays}`);
    }
    if (!Number.isInteger(startSlot) || startSlot < 0) {
      throw new Error(`startSlot must be a non-negative integer, got ${startSlot}`);
    }
    this.slot = startSlot;
    this.terminal = Math.floor(startSlot / slotsPerDay) >= totalDays;
  }

  get currentSlot(): number {
    return this.slot;
  }

  get totalSlots(): number {
    return this.slotsPerDay * this.totalDays;
  }

  current(): SlotInfo {
    return {
      slot: this.slot,
      day: Math.floor(this.slot / this.slotsPerDay),
      hour: this.slot % this.slotsPerDay,
    };
  }

  isTerminal(): boolean {
    return this.terminal;
  }

  isLastSlotOfDay(): boolean {
    return this.slot % this.slotsPerDay === this.slotsPerDay - 1;
  }

  /**
   * Move forward exactly one slot. Returns false, and stays put, once the
   * next slot would fall on day `totalDays`.
   */
  advance(): boolean {
    if (this.terminal) return false;
    const next = this.slot + 1;
    if (Math.floor(next / this.slotsPerDay) >= this.totalDays) {
      this.terminal = true;
      return false;
    }
    this.slot = next;
    return true;
  }
}
