import { z } from "zod";

const minutes = z.number().int().min(0);
const confidence = z.number().min(0).max(1);

export const sampleUnitSchema = z.object({
  unit_id: z.string().min(1),
  name: z.string().min(1),
  parent_unit_id: z.string().min(1).nullable(),
  level: z.string().min(1),
});

export const sampleSoldierSchema = z.object({
  soldier_id: z.string().min(1),
  name: z.string().min(1),
  rank: z.string().nullable().default(null),
  unit_id: z.string().min(1),
  device_id: z.string().nullable().default(null),
  status: z.enum(["active", "inactive"]).default("active"),
  last_seen_minutes_ago: minutes.nullable().default(null),
});

export const sampleRawInputSchema = z.object({
  input_id: z.string().min(1),
  soldier_id: z.string().min(1),
  minutes_ago: minutes,
  raw_text: z.string().min(1),
  input_type: z.enum(["voice", "text"]).default("voice"),
  confidence,
});

export const sampleReportSchema = z.object({
  report_id: z.string().min(1),
  soldier_id: z.string().min(1),
  unit_id: z.string().min(1),
  minutes_ago: minutes,
  report_type: z.string().min(1),
  structured: z.record(z.unknown()),
  confidence,
  source_input_id: z.string().min(1).nullable().default(null),
  status: z.enum(["generated", "reviewed"]).default("generated"),
});

export const sampleDeviceStatusSchema = z.object({
  device_id: z.string().min(1),
  soldier_id: z.string().min(1),
  status: z.string().default("active"),
  heartbeat_minutes_ago: minutes,
  battery_level: z.number().int().min(0).max(100),
  signal_strength: z.number().int().min(0).max(100),
  location_lat: z.number().min(-90).max(90),
  location_lon: z.number().min(-180).max(180),
});

export const sampleFragoSchema = z.object({
  frago_id: z.string().min(1),
  unit_id: z.string().min(1),
  task: z.string().min(1),
  assigned_by: z.string().min(1),
  assigned_minutes_ago: minutes,
  status: z.enum(["pending", "in_progress", "completed"]),
  priority: z.string().default("medium"),
  deadline_in_minutes: minutes,
});

export const sampleSuggestionSchema = z.object({
  suggestion_id: z.string().min(1),
  suggestion_type: z.string().min(1),
  status: z.string().default("pending"),
  unit_id: z.string().min(1).nullable(),
  urgency: z.string().min(1),
  reason: z.string().min(1),
  confidence,
  source_reports: z.array(z.string()).default([]),
});

export const sampleDataSchema = z.object({
  units: z.array(sampleUnitSchema),
  soldiers: z.array(sampleSoldierSchema),
  raw_inputs: z.array(sampleRawInputSchema),
  reports: z.array(sampleReportSchema),
  device_status: z.array(sampleDeviceStatusSchema),
  fragos: z.array(sampleFragoSchema),
  suggestions: z.array(sampleSuggestionSchema),
});

export type SampleData = z.infer<typeof sampleDataSchema>;
