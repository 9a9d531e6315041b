import type { Logger } from "../../logging/logger.js";
import type { DaySummary } from "../../store/types.js";
import { dropLast, estimateTokens, trimToBudget } from "../tokens.js";
import {
  emptyLayer,
  type ContextLayer,
  type ContextLayerBuilder,
  type LayerBuildRequest,
} from "../types.js";

export interface DaySummaryReader {
  /** Newest first. */
  listDailySummaries(iin: string, sinceDate: string): readonly DaySummary[];
}

const DAY_MS = 86_400_000;

const dayLabel = new Intl.DateTimeFormat("en-US", { month: "short", day: "numeric", timeZone: "UTC" });

export function formatDaySummaries(summaries: readonly DaySummary[]): string {
  return summaries
    .map((s) => {
      const parsed = Date.parse(`${s.date}T00:00:00Z`);
      const label = Number.isNaN(parsed) ? s.date : dayLabel.format(parsed);
      return `${label}: ${s.content}`;
    })
    .join("\n");
}

/** First calendar day (UTC) of a `days`-long window ending today. */
export function windowStart(now: number, days: number): string {
  return new Date(now - (days - 1) * DAY_MS).toISOString().slice(0, 10);
}

/** Day summaries from the nightly feed; the oldest day goes first when over budget. */
export class LongRangeLayer implements ContextLayerBuilder {
  readonly name = "longRange" as const;

  constructor(
    private readonly summaries: DaySummaryReader | null,
    private readonly logger: Logger,
  ) {}

  async build({ user, config, now }: LayerBuildRequest): Promise<ContextLayer> {
    const layer = config.layers.longRange;
    if (!layer.enabled || !this.summaries) return emptyLayer(this.name);

    const summaries = this.summaries.listDailySummaries(user.iin, windowStart(now, layer.maxDays));
    if (summaries.length === 0) return emptyLayer(this.name);

    const result = trimToBudget(summaries, formatDaySummaries, layer.tokenBudget, dropLast);
    const tokenCount = estimateTokens(result.content);
    this.logger.debug(
      { layer: this.name, days: result.items.length, tokens: tokenCount, trimmed: result.trimmed },
      "Layer built",
    );
    return {
      name: this.name,
      content: result.content,
      tokenCount,
      itemCount: result.items.length,
      trimmed: result.trimmed,
    };
  }
}
