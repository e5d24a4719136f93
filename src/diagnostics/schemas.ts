import { z } from 'zod';

export const PythonInfoSchema = z.object({
  python_version: z.string(),
  executable: z.string(),
  prefix: z.string(),
  base_prefix: z.string().nullable(),
  platform: z.string(),
});
export type PythonInfo = z.infer<typeof PythonInfoSchema>;

export const PackageInfoSchema = z.object({
  package: z.string(),
  version: z.string().nullable(),
  module_file: z.string().nullable(),
  dist_info: z.string().nullable(),
});
export type PackageInfo = z.infer<typeof PackageInfoSchema>;

export const ReportedErrorSchema = z.object({ error: z.string() });

const ModuleSummarySchema = z.object({
  version: z.string().nullable(),
  file: z.string().nullable(),
});

export const StackHealthSchema = z.object({
  ok: z.boolean(),
  mlx: ModuleSummarySchema.nullable(),
  mlx_lm: ModuleSummarySchema.nullable(),
  error: z.string().nullable(),
});
export type StackHealth = z.infer<typeof StackHealthSchema>;

/** Importable package or module path, e.g. `mlx_lm` or `mlx.core`. */
export const PackageNameSchema = z
  .string()
  .regex(/^[A-Za-z_][\w.-]*$/, 'Must be a package or module name');
