/**
 * Semantic validation of parsed entities
 *
 * Runs after parsing and before the graph is built. Problems are reported as
 * messages; nothing here throws.
 */

import { TOOL_RINGS, type Dimension, type Indicator, type Tool, type ValidationReport } from './types.js';

const SIMPLE_ID = /^[A-Za-z0-9_-]+$/;

/**
 * An id is either an http(s) URL or a token of letters, digits, `-` and `_`
 */
export function isValidEntityId(id: string): boolean {
  return id.startsWith('http://') || id.startsWith('https://') || SIMPLE_ID.test(id);
}

export function isKnownRing(ring: string): boolean {
  return TOOL_RINGS.some(known => known === ring.toLowerCase());
}

export function validateIndicator(indicator: Indicator): ValidationReport {
  const errors = checkCommonFields('Indicator', indicator);
  return { valid: errors.length === 0, errors };
}

export function validateTool(tool: Tool): ValidationReport {
  const errors = checkCommonFields('Tool', tool);

  if (tool.ring && !isKnownRing(tool.ring)) {
    errors.push(`Tool has invalid ring: ${tool.ring}`);
  }

  return { valid: errors.length === 0, errors };
}

export function validateDimension(dimension: Dimension): ValidationReport {
  const errors = checkCommonFields('Dimension', dimension);
  return { valid: errors.length === 0, errors };
}

/**
 * Validate every entity of the three collections
 * Errors are listed indicators first, then tools, then dimensions.
 */
export function validateCollections(
  indicators: Indicator[],
  tools: Tool[],
  dimensions: Dimension[]
): ValidationReport {
  console.log('🔍 Validating entity collections...');

  const errors = [
    ...indicators.flatMap(indicator => validateIndicator(indicator).errors),
    ...tools.flatMap(tool => validateTool(tool).errors),
    ...dimensions.flatMap(dimension => validateDimension(dimension).errors)
  ];

  console.log(`🔍 Validated ${indicators.length} indicators, ${tools.length} tools, ${dimensions.length} dimensions`);
  if (errors.length > 0) {
    console.warn(`⚠️ Found ${errors.length} validation errors`);
  } else {
    console.log('✅ All validations passed');
  }

  return { valid: errors.length === 0, errors };
}

function checkCommonFields(type: string, entity: { id: string; name: string }): string[] {
  const errors: string[] = [];

  if (!entity.id) {
    errors.push(`${type} missing required field: id`);
  }
  if (!entity.name) {
    errors.push(`${type} missing required field: name`);
  }
  if (entity.id && !isValidEntityId(entity.id)) {
    errors.push(`${type} ID has invalid format: ${entity.id}`);
  }

  return errors;
}
