export type SlotScalar = string | number | boolean | null;

export interface SlotValue {
  readonly value: SlotScalar;
  readonly filled: boolean;
  readonly source: string;
}

export type SlotMap = Readonly<Record<string, SlotValue>>;

export type MemoryStatus = "active" | "inactive";

export interface MemoryRecord {
  readonly id: string;
  readonly iin: string;
  readonly content: string;
  readonly type: string;
  readonly slots: SlotMap;
  readonly status: MemoryStatus;
  readonly context: string | null;
  readonly tier: string;
  readonly relevance: number;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface CalendarEvent {
  readonly id: string;
  readonly iin: string;
  readonly title: string;
  readonly startsAt: number;
  /** Display time as entered ("15:00"); derived from startsAt when absent. */
  readonly time: string | null;
  readonly description: string | null;
}

export type ChatRole = "user" | "assistant";

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
  readonly timestamp?: number;
}

/** One day of the nightly compression feed. */
export interface DaySummary {
  readonly date: string;
  readonly content: string;
  readonly topics: readonly string[];
}

export interface CachedSessionSummary {
  readonly summary: string;
  readonly messageCount: number;
  readonly generatedAt: number;
}
