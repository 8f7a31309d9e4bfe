export type EventType =
  | "engine_started"
  | "engine_stopped"
  | "order_invalid"
  | "order_placement_attempt"
  | "order_placement_result"
  | "order_placement_failed"
  | "order_skipped"
  | "pending_order_seen"
  | "pending_order_expired"
  | "pending_order_cancelled"
  | "pending_order_cancel_attempt"
  | "order_filled"
  | "position_adopted"
  | "tp_compressed"
  | "tp_compress_failed"
  | "partial_close_success"
  | "partial_close_failed"
  | "partial_deferred"
  | "partial_close_detected"
  | "sl_to_breakeven"
  | "tp_restored"
  | "protection_failed"
  | "deal_recorded"
  | "position_closed"
  | "orphaned_partial_state"
  | "state_inconsistency"
  | "new_day"
  | "no_setup"
  | "weekend_notice";

export interface EngineEvent {
  time: string;
  type: EventType;
  payload: Record<string, unknown>;
}
