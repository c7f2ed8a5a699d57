import { z } from "zod";

// ------------------------------------------------------------
// Core input tuple: one product/component edge, or one product
// with no component recorded (componentId = null).
// ------------------------------------------------------------

export const REPLENISHMENT_SYSTEMS = ["Purchase", "ProdOrder", "Unknown"] as const;
export type ReplenishmentSystem = (typeof REPLENISHMENT_SYSTEMS)[number];

export const bomRowSchema = z
  .object({
    rowIndex: z.number().int().nonnegative(),
    productId: z.string().nullable(),
    componentId: z.string().nullable(),
    quantityPer: z.number().finite().positive().nullable(),
    replenishmentSystem: z.string(),
    unitCost: z.number().finite().nonnegative(),
  })
  .superRefine((row, ctx) => {
    if (row.componentId !== null && row.componentId.trim() !== "" && row.quantityPer === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["quantityPer"],
        message: "Quantity per is required when a component is given",
      });
    }
  });

export type BomRow = z.infer<typeof bomRowSchema>;

export function parseReplenishmentSystem(raw: string | null | undefined): ReplenishmentSystem {
  const s = String(raw ?? "").trim().toLowerCase();
  if (s === "purchase") return "Purchase";
  if (s === "prod. order") return "ProdOrder";
  return "Unknown";
}

export function replenishmentLabel(system: ReplenishmentSystem): string {
  if (system === "ProdOrder") return "Prod. Order";
  return system;
}
