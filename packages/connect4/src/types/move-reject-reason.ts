export type MoveRejectReason = "wrong_player" | "column_full";
