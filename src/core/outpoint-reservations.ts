/**
 * Outpoint Reservations
 * Keeps outputs picked by an in-flight payout out of every later selection
 * until that payout's broadcast has a definitive outcome
 */

import { randomUUID } from 'node:crypto';

export interface OutpointReservation {
  lockId: string;
  outpoints: string[];
  expiresAt: number;
}

export class ReservationError extends Error {
  constructor(
    message: string,
    public readonly code: 'ALREADY_RESERVED' | 'EMPTY',
    public readonly outpoints: string[] = [],
  ) {
    super(message);
    this.name = 'ReservationError';
  }
}

export interface OutpointReservationsOptions {
  /** Default reservation lifetime */
  ttlMs?: number | undefined;
  now?: (() => number) | undefined;
}

export class OutpointReservations {
  private reservations = new Map<string, OutpointReservation>(); // lockId -> reservation
  private byOutpoint = new Map<string, string>(); // outpoint -> lockId
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: OutpointReservationsOptions = {}) {
    this.ttlMs = options.ttlMs ?? 10 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Reserve all outpoints or none
   */
  reserve(outpoints: string[], ttlMs = this.ttlMs): string {
    if (outpoints.length === 0) {
      throw new ReservationError('Nothing to reserve', 'EMPTY');
    }

    this.clearExpired();
    const conflicts = outpoints.filter((outpoint) => this.byOutpoint.has(outpoint));
    if (conflicts.length > 0) {
      throw new ReservationError(
        `Outpoints already reserved: ${conflicts.join(', ')}`,
        'ALREADY_RESERVED',
        conflicts,
      );
    }

    const lockId = randomUUID();
    this.reservations.set(lockId, {
      lockId,
      outpoints: [...outpoints],
      expiresAt: this.now() + ttlMs,
    });
    for (const outpoint of outpoints) {
      this.byOutpoint.set(outpoint, lockId);
    }
    return lockId;
  }

  /**
   * Returns false when the lock id is unknown or already expired
   */
  release(lockId: string): boolean {
    const reservation = this.reservations.get(lockId);
    if (!reservation) {
      return false;
    }
    this.drop(reservation);
    return true;
  }

  isReserved(outpoint: string): boolean {
    this.clearExpired();
    return this.byOutpoint.has(outpoint);
  }

  /**
   * Snapshot of the currently reserved outpoints
   */
  reservedOutpoints(): Set<string> {
    this.clearExpired();
    return new Set(this.byOutpoint.keys());
  }

  getReservation(lockId: string): OutpointReservation | null {
    this.clearExpired();
    const reservation = this.reservations.get(lockId);
    return reservation ? { ...reservation, outpoints: [...reservation.outpoints] } : null;
  }

  clearExpired(): number {
    const now = this.now();
    let cleared = 0;
    for (const reservation of [...this.reservations.values()]) {
      if (reservation.expiresAt <= now) {
        this.drop(reservation);
        cleared++;
      }
    }
    return cleared;
  }

  private drop(reservation: OutpointReservation): void {
    this.reservations.delete(reservation.lockId);
    for (const outpoint of reservation.outpoints) {
      if (this.byOutpoint.get(outpoint) === reservation.lockId) {
        this.byOutpoint.delete(outpoint);
      }
    }
  }
}
