import type { ContextLayersConfig } from "../../config/types.js";
import type { Logger } from "../../logging/logger.js";
import type { CalendarEvent } from "../../store/types.js";
import { estimateTokens } from "../tokens.js";
import {
  emptyLayer,
  type ContextLayer,
  type ContextLayerBuilder,
  type LayerBuildRequest,
} from "../types.js";

export interface CalendarReader {
  listEventsBetween(iin: string, from: number, to: number, limit: number): readonly CalendarEvent[];
}

type CalendarConfig = ContextLayersConfig["calendar"];

export function formatEvents(events: readonly CalendarEvent[], config: Pick<CalendarConfig, "format" | "timeZone">): string {
  const { timeZone } = config;
  switch (config.format) {
    case "list": {
      const day = new Intl.DateTimeFormat("en-US", { weekday: "short", month: "short", day: "numeric", timeZone });
      const clock = new Intl.DateTimeFormat("en-US", { hour: "numeric", minute: "2-digit", timeZone });
      return events
        .map((e) => `- ${day.format(e.startsAt)} ${e.time ?? clock.format(e.startsAt)}: ${e.title}`)
        .join("\n");
    }
    case "prose": {
      const day = new Intl.DateTimeFormat("en-US", { weekday: "long", month: "long", day: "numeric", timeZone });
      return events.map((e) => `${e.title} on ${day.format(e.startsAt)}`).join(". ");
    }
    case "json":
      return JSON.stringify(
        events.map((e) => ({
          title: e.title,
          startsAt: new Date(e.startsAt).toISOString(),
          time: e.time,
          description: e.description,
        })),
        null,
        2,
      );
  }
}

/** Events in the look-ahead window. Capped by count, never trimmed. */
export class CalendarLayer implements ContextLayerBuilder {
  readonly name = "calendar" as const;

  constructor(
    private readonly events: CalendarReader | null,
    private readonly logger: Logger,
  ) {}

  async build({ user, config, now }: LayerBuildRequest): Promise<ContextLayer> {
    const layer = config.layers.calendar;
    if (!layer.enabled || !this.events) return emptyLayer(this.name);

    const until = now + layer.lookaheadHours * 3_600_000;
    const events = this.events.listEventsBetween(user.iin, now, until, layer.maxEvents);
    if (events.length === 0) return emptyLayer(this.name);

    const content = formatEvents(events, layer);
    const tokenCount = estimateTokens(content);
    this.logger.debug({ layer: this.name, events: events.length, tokens: tokenCount }, "Layer built");
    return { name: this.name, content, tokenCount, itemCount: events.length, trimmed: false };
  }
}
