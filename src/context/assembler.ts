import type { ContextConfig, LayerName } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { estimateTokens } from "./tokens.js";
import {
  emptyLayer,
  type AssembledContext,
  type ContextLayer,
  type ContextLayerBuilder,
  type UserContext,
} from "./types.js";

/**
 * Builds every configured layer concurrently and joins the non-empty ones
 * under their section headers. A layer that fails is left out of the turn.
 */
export class ContextAssembler {
  constructor(
    private readonly builders: readonly ContextLayerBuilder[],
    private readonly logger: Logger,
  ) {}

  async assemble(user: UserContext, config: ContextConfig, now = Date.now()): Promise<AssembledContext> {
    const built = await Promise.all(
      this.builders.map((builder) =>
        builder.build({ user, config, now }).catch((err: unknown) => {
          this.logger.warn({ err, layer: builder.name, iin: user.iin }, "Context layer failed, skipping");
          return emptyLayer(builder.name);
        }),
      ),
    );

    const byName = new Map<LayerName, ContextLayer>();
    for (const layer of built) {
      if (layer.content.trim()) byName.set(layer.name, layer);
    }

    const layers: ContextLayer[] = [];
    for (const name of config.sections.order) {
      const layer = byName.get(name);
      if (layer) layers.push(layer);
    }

    const assembledText = layers
      .map((l) => `${config.sections.headers[l.name]}\n${l.content}`)
      .join("\n\n");

    const tokensPerLayer: Partial<Record<LayerName, number>> = {};
    for (const l of layers) tokensPerLayer[l.name] = l.tokenCount;

    const result: AssembledContext = {
      layers,
      assembledText,
      totalTokens: estimateTokens(assembledText),
      debug: {
        layersIncluded: layers.map((l) => l.name),
        tokensPerLayer,
        trimmed: layers.filter((l) => l.trimmed).map((l) => l.name),
      },
    };

    this.logger.debug(
      { iin: user.iin, layers: result.debug.layersIncluded, totalTokens: result.totalTokens },
      "Context assembled",
    );
    return result;
  }
}
