import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseToml } from "@iarna/toml";
import { z } from "zod";

import { ProjectSpecError } from "./errors.js";

export const DEFAULT_SPEC_FILES = ["addons.toml", "addons.json"] as const;

const relRuleSchema = z
  .string()
  .min(1)
  .superRefine((v, ctx) => {
    if (/^[\\/]/.test(v) || /^[a-zA-Z]:/.test(v)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${v}" must be a relative path`,
      });
      return;
    }
    if (v.split(/[\\/]+/).includes("..")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `"${v}" must not contain ".." components`,
      });
    }
  });

const addonSchema = z.object({
  path: z.string().min(1).optional(),
  include: z.array(relRuleSchema).optional(),
  exclude: z.array(relRuleSchema).optional(),
});

const projectSpecSchema = z.object({
  project_path: z.string().min(1).default("."),
  addon: z.record(z.string().min(1), addonSchema).default({}),
});

export type AddonSpec = {
  name: string;
  path?: string;
  include?: string[];
  exclude?: string[];
};

export type ProjectSpec = {
  projectPath: string;
  addons: AddonSpec[];
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function parseRaw(specPath: string, raw: string): unknown {
  try {
    return path.extname(specPath).toLowerCase() === ".json" ? JSON.parse(raw) : parseToml(raw);
  } catch (err) {
    throw new ProjectSpecError(`Failed to parse ${specPath}`, specPath, { cause: err });
  }
}

export function parseProjectSpec(data: unknown, specPath = "<inline>"): ProjectSpec {
  const parsed = projectSpecSchema.safeParse(data);
  if (!parsed.success) {
    throw new ProjectSpecError(`Invalid project spec ${specPath}: ${formatIssues(parsed.error)}`, specPath);
  }

  const projectPath = process.env.ADDON_SYNC_PROJECT_PATH?.trim()
    ? process.env.ADDON_SYNC_PROJECT_PATH.trim()
    : parsed.data.project_path;

  return {
    projectPath,
    addons: Object.entries(parsed.data.addon).map(([name, addon]) => ({
      name,
      ...(addon.path !== undefined ? { path: addon.path } : {}),
      ...(addon.include !== undefined ? { include: addon.include } : {}),
      ...(addon.exclude !== undefined ? { exclude: addon.exclude } : {}),
    })),
  };
}

export async function loadProjectSpec(specPath: string): Promise<ProjectSpec> {
  const abs = path.isAbsolute(specPath) ? specPath : path.join(process.cwd(), specPath);
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (err) {
    throw new ProjectSpecError(`Failed to read project spec ${abs}`, abs, { cause: err });
  }
  return parseProjectSpec(parseRaw(abs, raw), abs);
}

export function resolveSpecPath(workingDir: string, explicit?: string | null): string {
  if (explicit?.trim()) return path.resolve(workingDir, explicit.trim());
  for (const name of DEFAULT_SPEC_FILES) {
    const candidate = path.join(workingDir, name);
    if (existsSync(candidate)) return candidate;
  }
  return path.join(workingDir, DEFAULT_SPEC_FILES[0]);
}
