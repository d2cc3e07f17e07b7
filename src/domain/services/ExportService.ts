/**
 * Export Service - People Protocol envelope
 */

import { EXPORT_FRAMEWORK, EXPORT_VERSION, type ExportDocument, type TransformedSkill } from '../entities/Skill.js';

export const EXPORT_FILENAME = 'people_protocol_skills.json';

export function buildExportDocument(skills: TransformedSkill[]): ExportDocument {
  return {
    framework: EXPORT_FRAMEWORK,
    version: EXPORT_VERSION,
    skills: [...skills],
  };
}

export function serializeExportDocument(document: ExportDocument): string {
  return JSON.stringify(document, null, 2);
}
