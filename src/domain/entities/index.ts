/**
 * Domain Entities
 */

// Taxonomy records, rubrics, export envelope
export * from './Skill.js';

// Roles, conversations, recommendation results
export * from './Recommendation.js';
