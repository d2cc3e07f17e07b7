/**
 * Request schemas shared by the routes
 */

import { z } from 'zod';
import type { SkillRecord } from '../domain/entities/Skill.js';

const skillTypeInputSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
});

export const skillInputSchema = z
  .object({
    id: z.string().trim().min(1),
    name: z.string().trim().min(1),
    type: skillTypeInputSchema.nullish(),
    description: z.string().nullish(),
    infoUrl: z.string().nullish(),
  })
  .transform((input): SkillRecord => {
    const skill: SkillRecord = { id: input.id, name: input.name };
    if (input.type) skill.type = { id: input.type.id, name: input.type.name };
    if (input.description) skill.description = input.description;
    if (input.infoUrl) skill.infoUrl = input.infoUrl;
    return skill;
  });

export const conversationTurnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

export const roleSpecSchema = z.object({
  title: z.string().trim().min(1),
  count: z.number().int().positive(),
  description: z.string().trim().optional(),
});
