/**
 * Tool configuration
 *
 * Function-calling schema and place field allow-lists are data files under
 * ./data, validated once on first use.
 */

import { readFileSync } from 'fs';

import { z } from 'zod';

import type { ToolFunctionDefinition } from '@/types/index.js';

const toolDefinitionSchema = z.object({
  type: z.literal('function'),
  function: z.object({
    name: z.string().min(1),
    description: z.string(),
    parameters: z.record(z.unknown()),
  }),
});

const placeFieldsSchema = z.object({
  available: z.array(z.string()).min(1),
  search: z.array(z.string()).min(1),
});

export interface PlaceFieldConfig {
  /** Fields the assistant may request from describe_place */
  available: ReadonlySet<string>;
  /** Field mask used for text search results */
  search: readonly string[];
}

function readDataFile(name: string): unknown {
  const raw = readFileSync(new URL(`./data/${name}`, import.meta.url), 'utf-8');
  return JSON.parse(raw);
}

let toolDefinitions: ToolFunctionDefinition[] | null = null;
let placeFields: PlaceFieldConfig | null = null;

export function getToolDefinitions(): ToolFunctionDefinition[] {
  if (toolDefinitions === null) {
    toolDefinitions = z
      .array(toolDefinitionSchema)
      .parse(readDataFile('tool-definitions.json'));
  }
  return toolDefinitions;
}

export function getPlaceFieldConfig(): PlaceFieldConfig {
  if (placeFields === null) {
    const parsed = placeFieldsSchema.parse(readDataFile('place-fields.json'));
    placeFields = {
      available: new Set(parsed.available),
      search: parsed.search,
    };
  }
  return placeFields;
}
