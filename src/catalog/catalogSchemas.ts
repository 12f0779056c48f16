import { z } from "zod";
import { FORMULA_KINDS, QUANTITY_KEYS } from "../types/catalog.js";

// Prices may arrive as JSON numbers or as strings ("46.07"); both are read exactly.
const decimalInput = z.union([
  z.number().finite().nonnegative(),
  z.string().regex(/^\d+(\.\d+)?$/, "expected a non-negative decimal string"),
]);

const thicknessKey = z.string().regex(/^\d+$/, "thickness keys are whole millimetres");

export const productThicknessSchema = z.object({
  price: decimalInput.nullable(),
  usableWidth: z.number().positive(),
  spanLimit: z.number().positive(),
  thermalCoefficient: z.number().nonnegative().nullable().default(null),
});

export const productFamilySchema = z
  .object({
    name: z.string().min(1),
    lengthMinM: z.number().positive().optional(),
    lengthMaxM: z.number().positive().optional(),
    bulkDiscount: z
      .object({
        thresholdM2: z.number().positive(),
        percent: z.number().positive().max(100),
      })
      .optional(),
    thicknesses: z.record(thicknessKey, productThicknessSchema),
  })
  .refine((f) => Object.keys(f.thicknesses).length > 0, { message: "family has no thicknesses" })
  .refine((f) => f.lengthMinM === undefined || f.lengthMaxM === undefined || f.lengthMinM <= f.lengthMaxM, {
    message: "lengthMinM is greater than lengthMaxM",
  });

export const productsCatalogSchema = z.record(z.string().min(1), productFamilySchema);

export const accessorySchema = z
  .object({
    sku: z.string().min(1),
    name: z.string().min(1),
    category: z.string().min(1),
    unitMeasureKind: z.enum(["piece", "linear-length", "area"]),
    nominalPieceLength: z.number().positive().nullable().default(null),
    unitPrice: decimalInput.nullable().default(null),
    compatibility: z.object({
      families: z.array(z.string().min(1)).min(1),
      thicknessMm: z
        .object({
          min: z.number().int().positive().optional(),
          max: z.number().int().positive().optional(),
        })
        .optional(),
    }),
  })
  .superRefine((entry, ctx) => {
    if (entry.unitMeasureKind === "linear-length" && entry.nominalPieceLength === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["nominalPieceLength"],
        message: "linear-length entries need a nominal piece length",
      });
    }
  });

export const accessoriesCatalogSchema = z.array(accessorySchema);

export const bomItemRuleSchema = z.object({
  formula: z.enum(FORMULA_KINDS),
  accessoryCategory: z.string().min(1).optional(),
  sku: z.string().min(1).optional(),
  pieceLengthM: z.number().positive().optional(),
  unitsPerPoint: z.number().int().positive().optional(),
  coveragePerUnitM: z.number().positive().optional(),
  spacingM: z.number().positive().optional(),
});

export const bomSystemSchema = z.object({
  name: z.string().min(1),
  families: z.array(z.string().min(1)).min(1),
  installation: z.enum(["roof", "wall"]),
  items: z.record(z.enum(QUANTITY_KEYS), bomItemRuleSchema),
});

export const bomRulesCatalogSchema = z.record(z.string().min(1), bomSystemSchema);

export type ProductsCatalogInput = z.infer<typeof productsCatalogSchema>;
export type AccessoryInput = z.infer<typeof accessorySchema>;
export type BOMRulesCatalogInput = z.infer<typeof bomRulesCatalogSchema>;
