import { z } from "zod";

export const sampleSoldierSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  unit: z.string().min(1),
});

export const sampleReportSchema = z.object({
  report_type: z.string().min(1),
  confidence: z.number().min(0).max(1),
  structured_json: z.record(z.unknown()),
});

export const sampleReportGroupSchema = z.object({
  label: z.string().min(1),
  reports: z.array(sampleReportSchema).min(1),
});

export const sampleReportsSchema = z.object({
  soldiers: z.array(sampleSoldierSchema).min(1),
  groups: z.array(sampleReportGroupSchema),
});

export type SampleSoldier = z.infer<typeof sampleSoldierSchema>;
export type SampleReport = z.infer<typeof sampleReportSchema>;
export type SampleReports = z.infer<typeof sampleReportsSchema>;
