// 模型计价表
// 单价按 unit_tokens（默认一百万 token）计；查找顺序：精确匹配 > 最长前缀 > 默认价
import fs from "node:fs";
import { z } from "zod";
import bundledPricing from "../../config/model-pricing.json" with { type: "json" };
import type { NodeCost, TokenUsage } from "./types.mjs";

const ModelPriceSchema = z.object({
  prompt: z.number().nonnegative(),
  completion: z.number().nonnegative(),
});

export const PricingTableSchema = z.object({
  currency: z.string().min(1).default("USD"),
  unit_tokens: z.number().positive().default(1_000_000),
  default: ModelPriceSchema,
  models: z.record(ModelPriceSchema).default({}),
});

export type PricingTable = z.infer<typeof PricingTableSchema>;
export type ModelPrice = z.infer<typeof ModelPriceSchema>;

export class ModelPricing {
  private readonly models: Map<string, ModelPrice>;
  // 前缀匹配时长的优先
  private readonly prefixes: string[];

  constructor(private readonly table: PricingTable) {
    this.models = new Map(Object.entries(table.models).map(([name, price]) => [name.toLowerCase(), price]));
    this.prefixes = [...this.models.keys()].sort((a, b) => b.length - a.length);
  }

  get currency(): string {
    return this.table.currency;
  }

  priceFor(model: string | null): ModelPrice {
    if (!model) return this.table.default;
    const key = model.toLowerCase();
    const exact = this.models.get(key);
    if (exact) return exact;
    const prefix = this.prefixes.find((candidate) => key.startsWith(candidate));
    return (prefix ? this.models.get(prefix) : undefined) ?? this.table.default;
  }

  cost(usage: TokenUsage, model: string | null): NodeCost {
    const price = this.priceFor(model);
    const prompt_cost = (usage.prompt_tokens / this.table.unit_tokens) * price.prompt;
    const completion_cost = (usage.completion_tokens / this.table.unit_tokens) * price.completion;
    return {
      currency: this.table.currency,
      prompt_cost,
      completion_cost,
      total_cost: prompt_cost + completion_cost,
    };
  }

  zeroCost(): NodeCost {
    return { currency: this.table.currency, prompt_cost: 0, completion_cost: 0, total_cost: 0 };
  }
}

// 读取计价表：指定路径时读取该 JSON，否则使用随包发布的默认表
export function loadModelPricing(path?: string): ModelPricing {
  const raw: unknown = path ? JSON.parse(fs.readFileSync(path, "utf8")) : bundledPricing;
  return new ModelPricing(PricingTableSchema.parse(raw));
}
