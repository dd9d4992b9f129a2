// node/src/services/admin-levels.ts — per-region admin_level catalog shown to the planner
import { z } from 'zod';
import { ADMIN_LEVEL_FORMATS } from '@/types/core';
import rawAdminLevels from '@/data/admin-levels.json';

const adminLevelCatalogSchema = z.record(z.string(), z.record(z.enum(ADMIN_LEVEL_FORMATS), z.string()));

export type AdminLevelCatalog = z.infer<typeof adminLevelCatalogSchema>;

export const adminLevels: AdminLevelCatalog = adminLevelCatalogSchema.parse(rawAdminLevels);
