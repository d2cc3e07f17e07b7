/**
 * Export Service Tests
 */

import { describe, it, expect } from '@jest/globals';
import { buildExportDocument, serializeExportDocument } from '../../domain/services/index.js';
import { levels, IN_RANGE_COUNTS } from '../helpers/fakes.js';

describe('ExportService', () => {
  it('wraps an empty list in the envelope', () => {
    expect(buildExportDocument([])).toEqual({ framework: 'People Protocol', version: '1.0', skills: [] });
  });

  it('serializes skills in order', () => {
    const skills = [
      { name: 'Python', description: 'Language', lightcast_id: 'KS1', levels: levels(IN_RANGE_COUNTS) },
      { name: 'SQL', description: 'Queries', lightcast_id: 'KS2', levels: levels(IN_RANGE_COUNTS) },
    ];

    const parsed: unknown = JSON.parse(serializeExportDocument(buildExportDocument(skills)));

    expect(parsed).toEqual({ framework: 'People Protocol', version: '1.0', skills });
  });
});
