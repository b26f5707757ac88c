// ============================================================================
// Resources
// ============================================================================
// Static guidance documents served verbatim from resources/guidance/, plus
// resources built from the data engine on every read.
// ============================================================================

import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import type { InsightsClient } from '../insights/client.js';
import { tablesResource } from './tables.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

// Same relative location from src/resources and dist/resources.
export const GUIDANCE_DIR = path.resolve(__dirname, '..', '..', 'resources', 'guidance');

export interface ResourceSpec {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
  /** Produces the text content; dynamic resources query the engine here */
  read: () => Promise<string>;
}

function guidance(slug: string, description: string): ResourceSpec {
  return {
    uri: `file://guidance/${slug}`,
    name: slug,
    description,
    mimeType: 'text/markdown',
    read: () => fs.readFile(path.join(GUIDANCE_DIR, `${slug}.md`), 'utf-8'),
  };
}

export const guidanceResources: ResourceSpec[] = [
  guidance('insights-get-data', 'Parameters and examples for the insights_get_data tool'),
  guidance('insights-get-countby', 'Parameters and examples for the insights_get_countby tool'),
];

export function createResources(client: InsightsClient): ResourceSpec[] {
  return [...guidanceResources, tablesResource(client)];
}
