import type { ContextConfig, LayerName } from "../config/types.js";
import type { ChatMessage } from "../store/types.js";

export interface ContextLayer {
  readonly name: LayerName;
  readonly content: string;
  readonly tokenCount: number;
  readonly itemCount: number;
  readonly trimmed: boolean;
}

/** A ranked memory as handed to the context stage. */
export interface ContextMemory {
  readonly id: string;
  readonly content: string;
  readonly type: string;
  readonly context?: string | null;
  readonly relevance: number;
  readonly tier: string;
  readonly createdAt?: number;
}

export interface UserContext {
  readonly iin: string;
  readonly message: string;
  readonly sessionId?: string;
  readonly sessionMessages?: readonly ChatMessage[];
  readonly memories?: readonly ContextMemory[];
}

export interface LayerBuildRequest {
  readonly user: UserContext;
  readonly config: ContextConfig;
  /** Epoch ms the turn is evaluated at. */
  readonly now: number;
}

export interface ContextLayerBuilder {
  readonly name: LayerName;
  build(request: LayerBuildRequest): Promise<ContextLayer>;
}

export interface AssembledContext {
  readonly layers: readonly ContextLayer[];
  readonly assembledText: string;
  readonly totalTokens: number;
  readonly debug: {
    readonly layersIncluded: readonly LayerName[];
    readonly tokensPerLayer: Readonly<Partial<Record<LayerName, number>>>;
    readonly trimmed: readonly LayerName[];
  };
}

export function emptyLayer(name: LayerName): ContextLayer {
  return { name, content: "", tokenCount: 0, itemCount: 0, trimmed: false };
}
