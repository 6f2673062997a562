import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

const configSchema = z.object({
  subject: z.string().nullable().optional(),
  zoom: z.number().positive().optional(),
  diagrams: z
    .object({
      min_area: z.number().min(0).optional(),
      reference_zoom: z.number().positive().optional(),
      threshold: z.number().int().min(0).max(255).optional(),
      blur_kernel: z.number().int().min(1).optional(),
      jpeg_quality: z.number().int().min(1).max(100).optional(),
      concurrency: z.number().int().min(1).optional(),
    })
    .optional(),
  structure: z
    .object({
      chapter_title: z.string().optional(),
      default_chapter_name: z.string().optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

export interface DiagramSettings {
  zoom: number;
  minArea: number;
  referenceZoom: number;
  threshold: number;
  blurKernel: number;
  jpegQuality: number;
  concurrency?: number;
}

export interface StructureSettings {
  chapterTitle: string | null;
  defaultChapterName: string;
  subject: string | null;
}

export const DEFAULT_SUBJECT = "Mathematics";
export const DEFAULT_CHAPTER_NAME = "Untitled Chapter";

export function loadConfig(configPath?: string): AppConfig {
  const resolved =
    configPath ?? path.resolve(process.env.CONFIG_PATH ?? path.join(process.cwd(), "config.yaml"));
  if (!fs.existsSync(resolved)) return {};
  const raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  return configSchema.parse(raw ?? {});
}

export function getDiagramSettings(cfg: AppConfig): DiagramSettings {
  const d = cfg.diagrams ?? {};
  return {
    zoom: cfg.zoom ?? 3,
    minArea: d.min_area ?? 1000,
    referenceZoom: d.reference_zoom ?? 3,
    threshold: d.threshold ?? 200,
    blurKernel: d.blur_kernel ?? 5,
    jpegQuality: d.jpeg_quality ?? 90,
    concurrency: d.concurrency,
  };
}

export function getStructureSettings(cfg: AppConfig): StructureSettings {
  return {
    chapterTitle: cfg.structure?.chapter_title ?? null,
    defaultChapterName: cfg.structure?.default_chapter_name ?? DEFAULT_CHAPTER_NAME,
    subject: cfg.subject === undefined ? DEFAULT_SUBJECT : cfg.subject,
  };
}

// ============================================================================
// Filesystem roots
// ============================================================================

export function getOutputRoot(): string {
  return path.resolve(process.env.OUTPUT_ROOT ?? "output");
}

export function getUploadDir(): string {
  return path.resolve(process.env.UPLOAD_DIR ?? "uploads");
}

export function getDatabasePath(): string {
  return path.resolve(process.env.DATABASE_PATH ?? path.join(getOutputRoot(), "extractions.db"));
}
