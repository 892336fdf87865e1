import * as z from "zod/v4";

export const zJobId = z.string().regex(/^(local|ge)_[0-9A-Za-z.]+$/, "invalid job_id");
export const zJobName = z
  .string()
  .min(1)
  .max(256)
  .regex(/^[^/\\\0]+$/, "job name must not contain path separators");
export const zLogStream = z.enum(["stdout", "stderr"]);

export const zJobSubmitInput = z.object({
  name: zJobName,
  working_dir: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).max(1024).optional()
});

export const zJobSubmitOutput = z.object({
  job_id: zJobId,
  name: z.string(),
  log_file: z.string(),
  err_file: z.string().nullable()
});

export const zJobStatusInput = z.object({
  job_id: zJobId
});

export const zJobStatusOutput = z.object({
  job_id: zJobId,
  name: z.string(),
  running: z.boolean(),
  error_state: z.boolean(),
  submitted_at: z.string(),
  log_file: z.string(),
  err_file: z.string().nullable()
});

export const zJobTerminateInput = z.object({
  job_id: zJobId
});

export const zJobTerminateOutput = z.object({
  job_id: zJobId,
  accepted: z.boolean()
});

export const zJobListInput = z.object({});

export const zJobListOutput = z.object({
  job_ids: z.array(zJobId)
});

export const zJobLogPreviewInput = z.object({
  job_id: zJobId,
  stream: zLogStream,
  max_lines: z.number().int().positive().optional()
});

export const zJobLogPreviewOutput = z.object({
  job_id: zJobId,
  stream: zLogStream,
  path: z.string().nullable(),
  exists: z.boolean(),
  text: z.string(),
  truncated: z.boolean()
});

export const zRunnerSetLogDirInput = z.object({
  log_dir: z.string().min(1).nullable()
});

export const zRunnerSetLogDirOutput = z.object({
  log_dir: z.string().nullable()
});
