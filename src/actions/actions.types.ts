export type Action = {
  id: number;
  action: string;   // trimmed, 1..255 chars
  date: string;     // YYYY-MM-DD, never in the future
  points: number;   // positive integer
};

export type ActionFields = Omit<Action, "id">;

export type ActionPatch = Partial<ActionFields>;

export type FieldErrors = Record<string, string[]>;
