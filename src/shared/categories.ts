import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse } from 'yaml';
import { getPackageRoot, resolvePath } from './utils.js';
import { ConfigError } from './errors.js';

export const GENERIC_CATEGORY = '_generic';

export const CategoryPresetsSchema = z.object({
  categories: z
    .record(z.string(), z.array(z.string().min(1)).min(1))
    .refine((c) => GENERIC_CATEGORY in c, {
      message: `presets must define a ${GENERIC_CATEGORY} fallback`,
    }),
});

export type CategoryPresets = z.infer<typeof CategoryPresetsSchema>;

export interface ResolvedCategory {
  category: string;
  hashtags: string[];
  /** True when the category was unknown and the generic list was used. */
  fallback: boolean;
}

function getDefaultPresetsPath(): string {
  return path.join(getPackageRoot(), 'presets', 'categories.yaml');
}

export function loadCategoryPresets(file?: string): CategoryPresets {
  const presetsPath = file ? resolvePath(file) : getDefaultPresetsPath();
  if (!fs.existsSync(presetsPath)) {
    throw new ConfigError(`Category presets not found: ${presetsPath}`);
  }

  const raw = yamlParse(fs.readFileSync(presetsPath, 'utf-8')) as unknown;
  const parsed = CategoryPresetsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid category presets: ${presetsPath}`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  return parsed.data;
}

export function listCategories(presets: CategoryPresets): string[] {
  return Object.keys(presets.categories)
    .filter((name) => name !== GENERIC_CATEGORY)
    .sort();
}

export function resolveCategory(presets: CategoryPresets, category: string): ResolvedCategory {
  const key = category.trim().toLowerCase();
  const hashtags = presets.categories[key];
  if (hashtags && key !== GENERIC_CATEGORY) {
    return { category: key, hashtags, fallback: false };
  }
  return {
    category: key,
    hashtags: presets.categories[GENERIC_CATEGORY] ?? [],
    fallback: true,
  };
}
