/**
 * Optional event publishing.
 * Every pool lifecycle transition, access decision and request rejection
 * emits an event. All methods are optional; subscribe only to what you need.
 *
 * Categories:
 * - Pool lifecycle: created, failed, error, closed
 * - Access: granted, denied, failed
 * - Requests: context attached, rejected
 * - Health: checked
 */
export interface EventBus {
  // ── Pool Lifecycle ────────────────────────────────────────────────
  onPoolCreated?(e: { target: string; durationMs: number }): void;
  onPoolFailed?(e: { target: string; operation: string; error: { code: string; message: string } }): void;

  /**
   * Emitted when an idle client of an established pool errors.
   * The pool stays cached; pg replaces the client.
   */
  onPoolError?(e: { target: string; message: string }): void;
  onPoolsClosed?(e: { count: number }): void;

  // ── Access ────────────────────────────────────────────────────────
  onAccessGranted?(e: { userId: number; plantId: string; role: string }): void;

  /** Audit record. Carries no reason. */
  onAccessDenied?(e: { userId: number; plantId: string }): void;
  onAccessFailed?(e: { userId: number; plantId: string; operation: string; message: string }): void;

  // ── Requests ──────────────────────────────────────────────────────
  onContextAttached?(e: { plantId: string; userId: number; durationMs: number }): void;
  onRequestRejected?(e: { state: string; code: string; status: number; plantId?: string; userId?: number }): void;

  // ── Health ────────────────────────────────────────────────────────
  onHealthChecked?(e: { status: string; unreachable: string[]; durationMs: number }): void;
}
