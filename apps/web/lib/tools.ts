import { readFileSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

import { z } from 'zod';

import { ANALYSIS_TYPES } from '../../../domains/analysis/domain/analysisTypes';

const TOOLS_FILE = path.join(path.dirname(fileURLToPath(import.meta.url)), '../data/tools.json');

const ToolSchema = z.object({
  type: z.enum(ANALYSIS_TYPES),
  title: z.string().min(1),
  description: z.string(),
  loadingMessage: z.string().min(1),
  features: z.array(z.string()),
});

export type Tool = z.infer<typeof ToolSchema>;

let cached: Tool[] | undefined;

/**
* Tool cards shown on the form page, in display order
*/
export function getTools(): Tool[] {
  if (!cached) {
    const raw: unknown = JSON.parse(readFileSync(TOOLS_FILE, 'utf8'));
    cached = z.array(ToolSchema).parse(raw);
  }
  return cached;
}
