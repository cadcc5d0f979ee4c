/**
 * Cashflow Model — Input Schema
 *
 * zod schemas for plain-object project definitions, using the established
 * input vocabulary (DiscountRate, Life_time, mult_target, ...). Parsed
 * values become frozen definitions via the constructors in definitions.ts.
 */

import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { CashFlow, ProjectDefinition } from "./types";
import { INDICATOR_NAMES } from "./types";
import { ConfigurationError } from "./errors";
import { createCapex, createComponent, createGlobalSettings, createRecurring } from "./definitions";

const Series = z.array(z.number().finite()).min(1);
const ParamValueSchema = z.union([z.number().finite(), Series]);

const IndicatorSchema = z.object({
  name: z.array(z.enum(INDICATOR_NAMES)).min(1),
  target: z.number().finite().optional(),
  active: z.array(z.string().regex(/^[^|]+\|[^|]+$/, 'expected "Component|CashFlow"')).min(1),
});

export const GlobalSettingsSchema = z.object({
  DiscountRate: z.number().finite(),
  tax: z.number().min(0).max(1).default(0),
  inflation: z.number().finite().default(0),
  ProjectTime: z.number().int().positive().optional(),
  Indicator: IndicatorSchema,
  Output: z.boolean().default(false),
});

const CashFlowCommonSchema = z.object({
  name: z.string().trim().min(1).refine((s) => !s.includes("|"), 'names cannot contain "|"'),
  taxable: z.boolean(),
  inflation: z.enum(["real", "nominal", "none"]),
  mult_target: z.boolean().default(false),
  multiply: z.union([z.number().finite(), z.string().min(1)]).optional(),
  driver: z.union([ParamValueSchema, z.string().min(1)]).optional(),
  alpha: ParamValueSchema.optional(),
  reference: z.number().finite().optional(),
  X: z.number().finite().optional(),
});

const CapexSchema = CashFlowCommonSchema.extend({
  type: z.literal("Capex"),
  depreciate: z
    .object({
      scheme: z.string().min(1),
      plan: z.array(z.number().finite()).min(1),
    })
    .optional(),
});

const RecurringSchema = CashFlowCommonSchema.extend({
  type: z.literal("Recurring"),
  yearly: Series.optional(),
});

export const CashFlowSchema = z.discriminatedUnion("type", [CapexSchema, RecurringSchema]);

export const ComponentSchema = z.object({
  name: z.string().trim().min(1).refine((s) => !s.includes("|"), 'names cannot contain "|"'),
  Life_time: z.number().int().positive(),
  StartTime: z.number().int().default(0),
  Repetitions: z.number().int().min(0).default(0),
  tax: z.number().min(0).max(1).optional(),
  inflation: z.number().finite().optional(),
  CashFlows: z.array(CashFlowSchema).default([]),
});

export const ProjectDefinitionSchema = z.object({
  Global: GlobalSettingsSchema,
  Components: z.array(ComponentSchema).min(1),
});

export type ProjectDefinitionInput = z.input<typeof ProjectDefinitionSchema>;

function toCashFlow(raw: z.infer<typeof CashFlowSchema>): CashFlow {
  const common = {
    name: raw.name,
    taxable: raw.taxable,
    inflation: raw.inflation,
    multiplier: raw.multiply,
    multTarget: raw.mult_target,
    driver: raw.driver,
    alpha: raw.alpha,
    reference: raw.reference,
    scale: raw.X,
  };
  if (raw.type === "Capex") return createCapex({ ...common, depreciation: raw.depreciate });
  return createRecurring({ ...common, yearly: raw.yearly });
}

/**
 * Validate a plain-object project definition and build the typed,
 * immutable definitions. Schema failures surface as a ConfigurationError
 * whose issues list each offending path.
 */
export function parseProjectDefinition(raw: unknown): ProjectDefinition {
  const parsed = ProjectDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError("Invalid project definition (see issues)", issues);
  }
  const { Global, Components } = parsed.data;

  const settings = createGlobalSettings({
    discountRate: Global.DiscountRate,
    tax: Global.tax,
    inflation: Global.inflation,
    indicators: Global.Indicator.name,
    target: Global.Indicator.target,
    projectTime: Global.ProjectTime,
    active: Global.Indicator.active,
    output: Global.Output,
  });

  const components = Components.map((c) =>
    createComponent({
      name: c.name,
      lifetime: c.Life_time,
      startTime: c.StartTime,
      repetitions: c.Repetitions,
      tax: c.tax,
      inflation: c.inflation,
      cashflows: c.CashFlows.map(toCashFlow),
    }),
  );

  return { settings, components };
}

/** JSON Schema document for project definitions, for editors and external validators. */
export function projectDefinitionJsonSchema() {
  return zodToJsonSchema(ProjectDefinitionSchema, "ProjectDefinition");
}
