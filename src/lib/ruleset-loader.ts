// Ruleset package loader — validates and returns a typed RulesetPackage.
// Uses the Zod schema for shape validation, then checks cross references.

import type { RulesetPackage } from '@/rules/schema';
import { rulesetPackageSchema } from '@/lib/ruleset-schema';

function findCrossReferenceIssues(ruleset: RulesetPackage): string[] {
  const issues: string[] = [];
  const templateIds = new Set(ruleset.unitTemplates.map((t) => t.id));
  const structureIds = new Set(ruleset.structures.map((s) => s.id));

  for (const template of ruleset.unitTemplates) {
    const used = template.components.reduce((sum, c) => sum + c.size, 0);
    const capacity = ruleset.hullClasses[template.hull].capacity;
    if (used > capacity) {
      issues.push(`unitTemplates.${template.id}: components use ${used} of ${capacity} hull capacity`);
    }
    for (const component of template.components) {
      if (component.kind === 'colony' && component.cargo > component.maxCargo) {
        issues.push(`unitTemplates.${template.id}: colony cargo exceeds maxCargo`);
      }
      if (component.kind !== 'constructor') continue;
      for (const structureId of component.buildable) {
        if (!structureIds.has(structureId)) {
          issues.push(`unitTemplates.${template.id}: unknown buildable structure ${structureId}`);
        }
      }
    }
  }

  for (const structure of ruleset.structures) {
    if (structure.kind === 'unit' && !templateIds.has(structure.unitTemplateId)) {
      issues.push(`structures.${structure.id}: unknown unit template ${structure.unitTemplateId}`);
    }
  }

  for (const templateId of ruleset.startingFleet) {
    if (!templateIds.has(templateId)) {
      issues.push(`startingFleet: unknown unit template ${templateId}`);
    }
  }

  return issues;
}

export function loadRuleset(raw: unknown): RulesetPackage {
  if (raw === null || typeof raw !== 'object') {
    throw new Error('Ruleset data must be a non-null object');
  }

  const result = rulesetPackageSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.slice(0, 5)
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Ruleset validation failed: ${issues}`);
  }

  const ruleset: RulesetPackage = result.data;
  const referenceIssues = findCrossReferenceIssues(ruleset);
  if (referenceIssues.length > 0) {
    throw new Error(`Ruleset validation failed: ${referenceIssues.slice(0, 5).join('; ')}`);
  }

  return ruleset;
}

export function loadRulesetFromJson(json: string): RulesetPackage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new Error(`Failed to parse ruleset JSON: ${String(err)}`);
  }
  return loadRuleset(parsed);
}
