import { z } from "zod";

export interface HierarchyUnit {
  unit_id: string;
  name: string;
  parent_unit_id: string | null;
  level: string | null;
  children?: HierarchyUnit[];
}

export const hierarchyUnitSchema: z.ZodType<HierarchyUnit, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    unit_id: z.string().min(1),
    name: z.string().default(""),
    parent_unit_id: z
      .string()
      .nullable()
      .optional()
      .transform((value) => value ?? null),
    level: z
      .union([z.string(), z.number()])
      .nullable()
      .optional()
      .transform((value) => (value === null || value === undefined ? null : String(value))),
    children: z.array(hierarchyUnitSchema).optional(),
  }),
);

export const hierarchyResponseSchema = z.object({
  units: z.array(hierarchyUnitSchema),
});

export const rawInputCreatedSchema = z.object({
  input_id: z.string().min(1),
});

export const reportCreatedSchema = z.object({
  report_id: z.string().min(1),
});

export const chatResponseSchema = z.object({
  timestamp: z.string().optional(),
  reports_analyzed: z.number().int().min(0).optional(),
  response: z.string(),
});

export type HierarchyResponse = z.infer<typeof hierarchyResponseSchema>;
export type ChatResponse = z.infer<typeof chatResponseSchema>;

export const backendChatReportSchema = z.object({
  report_type: z.string().min(1),
  timestamp: z.string(),
  soldier_name: z.string(),
  structured_json: z.string(),
});

export const frontendChatReportSchema = z.object({
  type: z.string().min(1),
  time: z.string(),
  from: z.string(),
  data: z.record(z.unknown()),
});

export type BackendChatReport = z.infer<typeof backendChatReportSchema>;
export type FrontendChatReport = z.infer<typeof frontendChatReportSchema>;
