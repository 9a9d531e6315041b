import type { QuickReply, SaveDecision } from "./types.js";

const GREETING_REPLIES: readonly QuickReply[] = [
  { id: "qr_howareyou", label: "How are you?", message: "How are you doing today?", icon: "👋" },
  { id: "qr_whatcanido", label: "What can you do?", message: "What can you help me with?", icon: "❓" },
  { id: "qr_tellme", label: "Tell me something", message: "Tell me something interesting", icon: "💡" },
];

const SAVED_REPLIES: readonly QuickReply[] = [
  { id: "qr_showmemories", label: "Show my memories", message: "Show me what you remember about me", icon: "🧠" },
  { id: "qr_addmore", label: "Add more", message: "I want to tell you something else", icon: "➕" },
  { id: "qr_thanks", label: "Thanks!", message: "Thanks, that's all for now", icon: "👍" },
];

const RECALL_REPLIES: readonly QuickReply[] = [
  { id: "qr_lastweek", label: "Last week", message: "What happened last week?", icon: "📅" },
  { id: "qr_relationships", label: "My people", message: "Who do you know about in my life?", icon: "👥" },
  { id: "qr_events", label: "Upcoming events", message: "What events do I have coming up?", icon: "📆" },
];

const QUESTION_REPLIES: readonly QuickReply[] = [
  { id: "qr_tellmore", label: "Tell me more", message: "Tell me more about that", icon: "📖" },
  { id: "qr_example", label: "Give an example", message: "Can you give me an example?", icon: "💡" },
];

/** Suggested follow-ups for the intent. None while cards are pending. */
export function buildQuickReplies(
  intent: string | undefined,
  saveDecision: SaveDecision | undefined,
  holding: boolean,
): readonly QuickReply[] | undefined {
  if (holding) return undefined;
  switch (intent) {
    case "greeting":
    case "smalltalk":
      return GREETING_REPLIES;
    case "memory_instruction":
      return saveDecision?.saved === true ? SAVED_REPLIES : undefined;
    case "memory_recall":
    case "memory_recall_temporal":
      return RECALL_REPLIES;
    case "question":
      return QUESTION_REPLIES;
    default:
      return undefined;
  }
}
