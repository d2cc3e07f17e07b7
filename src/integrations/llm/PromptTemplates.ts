/**
 * Prompt Templates - Instruction documents for the completion backend
 *
 * Three fixed templates, one per use case. Placeholders use the
 * {{name}} syntax and are filled with buildPrompt().
 */

// =============================================================================
// SHARED
// =============================================================================

/** Appended to every prompt before it is sent */
export const JSON_ONLY_REMINDER =
  'Remember: Return ONLY valid JSON in the exact structure specified, no markdown, no explanation.';

// =============================================================================
// RUBRIC TRANSFORMATION
// =============================================================================

export const TRANSFORMATION_PROMPT = `You are transforming skills into the People Protocol framework format.

## What is a Skill?

Skills are technical and functional competencies required for a role. They are NOT:
- Behaviors/Values (universal organizational attributes)
- Deliverables (output metrics like speed, quality)
- Personality traits (abstract characteristics)

Skills provide clear roadmaps for growth, objective recruitment criteria, and standardized expectations.

## The Five Proficiency Levels

Each skill uses a consistent five-level scale that builds cumulatively. An employee at "Advanced" has demonstrated all behaviors at Poor (absence of), Basic, and Intermediate levels.

| Level | Label | Definition |
|-------|-------|------------|
| 1 | **Poor** | Red flag behaviors—no employee should exhibit these. Indicates fundamental gaps or negative impact. |
| 2 | **Basic** | Minimum acceptable standard. Foundational competency expected of entry-level employees. |
| 3 | **Intermediate** | Solid proficiency. Independent execution with reliability on complex tasks. |
| 4 | **Advanced** | High mastery. Strategic application, innovation, and ability to handle novel situations. |
| 5 | **Exceptional** | World-class. Industry-leading expertise that only the very best demonstrate. |

## Observable Statement Requirements

Each statement must be:
- **Observable**: Based on actions a manager can witness, not internal states
- **Specific**: Describes concrete behaviors, not vague qualities
- **Binary**: Can be answered Yes or No without ambiguity
- **Action-oriented**: Uses verbs that describe what someone does
- **Level-appropriate**: Complexity matches the proficiency level

**Good examples**: "Delivers tasks on time", "Identifies errors in seemingly correct statements by applying critical thinking", "Breaks down simple problems based on data and resolves them"

**Bad examples**: "Has good time management", "Thinks critically", "Is pretty good at problem-solving"

## Statement Quantity Per Level

- **Poor**: 2–5 statements (define clear "red lines")
- **Basic**: 2–4 statements (core foundational behaviors)
- **Intermediate**: 2–4 statements (solid independent performance)
- **Advanced**: 3–5 statements (multiple aspects of mastery)
- **Exceptional**: 1–3 statements (rare, distinctive achievements)

**Total per skill**: 12–20 observable statements.

## Statement Writing Patterns by Level

**Poor Level** (what NOT to do):
- "Demonstrates unstructured [skill], fails to [expected outcome]"
- "Lacks [key attribute], [negative consequence]"
- "[Negative behavior] when challenged"
- "Unable to [basic expectation]"

**Basic Level** (foundational competency):
- "Shows common sense by [observable action]"
- "Can [basic task] based on [inputs]"
- "[Core competency]: [expected output]"
- "Recognizes [fundamental concepts] and applies them correctly"

**Intermediate Level** (independent execution):
- "Identifies [nuanced issues] by applying [method]"
- "Delves into [complex areas] until reaching deep understanding"
- "Consistently [positive behavior] without supervision"
- "Able to [complex output] with minimal guidance"

**Advanced Level** (strategic mastery):
- "Can synthesize [complex inputs] and connect [non-obvious elements]"
- "Approaches [skill area] in an innovative way"
- "Able to [teach/mentor/develop] others in [skill area]"
- "Creates [frameworks/standards] adopted by the team"

**Exceptional Level** (industry-leading):
- "Engages in [abstract/theoretical work] at the highest level"
- "Solves [unprecedented challenges] using [advanced methods]"
- "Recognized externally as an authority in [skill area]"
- "Redefines [industry/field] standards and expectations"

## Scorecard Mechanics

Managers assess skills by reviewing each statement starting from Poor, marking "Yes" or "No" based on observed behavior, and stopping at the first "No" response. The employee's level is the highest level where all statements are "Yes".

**Critical**: Earlier statements (Poor, Basic) must be absolute prerequisites. A "No" at Basic means the employee scores Poor, regardless of advanced capabilities.

## Quality Checklist

Before generating statements, ensure:
- All statements are observable (manager can answer Yes/No)
- Each statement is distinct (no duplicates across levels)
- Poor level describes genuinely problematic behaviors
- Basic level is achievable by entry-level employees
- Exceptional level is genuinely rare (top 1–5%)
- Statements use action verbs (demonstrates, delivers, identifies, creates)
- Statements avoid subjective qualifiers (good, bad, excellent)
- Progression from Poor → Exceptional shows clear capability increase

## Output Format

Return ONLY valid JSON in this exact structure (no markdown, no explanation):

{
  "name": "Skill Name",
  "description": "One-line definition",
  "lightcast_id": "original_id",
  "levels": {
    "poor": ["statement 1", "statement 2"],
    "basic": ["statement 1", "statement 2"],
    "intermediate": ["statement 1", "statement 2"],
    "advanced": ["statement 1", "statement 2", "statement 3"],
    "exceptional": ["statement 1"]
  }
}

## Skill to Transform

Name: {{skill_name}}
Description: {{skill_description}}
Lightcast ID: {{skill_id}}

Return ONLY the JSON object, nothing else.`;

// =============================================================================
// ROLE GENERATION
// =============================================================================

export const ROLE_GENERATION_PROMPT = `You are a workforce planning assistant. Your job is to generate realistic role breakdowns for companies based on their size.

## Your Task

Given a company size (number of employees), generate a realistic breakdown of roles that would exist in such a company. Consider:
- Typical organizational structure for that size
- Common departments and functions
- Realistic role distributions
- Industry-standard role titles

## Response Format

Return ONLY valid JSON in this exact format:
{
  "roles": [
    {
      "title": "Role Title",
      "count": 2,
      "description": "Brief description of what this role does"
    }
  ]
}

## Guidelines

- Use realistic, industry-standard role titles (e.g., "Senior Software Engineer", "Product Manager", "UX Designer")
- The total count of all roles should approximately match the company size (within 10% is acceptable)
- Include a mix of roles: leadership, individual contributors, specialists, etc.
- For small companies (1-50), focus on essential roles with minimal hierarchy
- For medium companies (51-200), include more specialized roles and some management layers
- For large companies (200+), include more hierarchy, specialized departments, and management roles
- Each role should have a brief, clear description
- Return at least 3 roles, but be realistic about the number based on company size

## Examples

For a company of 25 employees:
- CEO (1)
- CTO / Technical Lead (1)
- Senior Software Engineers (3-4)
- Software Engineers (4-5)
- Product Manager (1)
- UX/UI Designer (1-2)
- Marketing Manager (1)
- Sales Representatives (2-3)
- Operations/HR (1-2)
- Customer Support (2-3)

For a company of 100 employees:
- More specialized roles
- Department heads
- More individual contributors in each area
- Support functions (HR, Finance, IT, etc.)

Return ONLY the JSON object, no markdown, no explanation outside the JSON.

Company Size: {{company_size}} employees

Generate a realistic role breakdown for this company size.

Generate the role breakdown now.`;

// =============================================================================
// SKILL RECOMMENDATION
// =============================================================================

export const RECOMMENDATION_PROMPT = `You are a skill recommendation assistant. Your job is to help identify the top 6 most important and diverse skills for a given role.

## Your Task

Given a role title and any additional context provided, you need to:
1. Determine if you have enough information to recommend skills, OR
2. Ask a single, specific follow-up question to get more context

## When to Ask Follow-up Questions

Ask follow-up questions when:
- The role title is ambiguous (e.g., "Manager" - what type?)
- Industry/domain context would improve recommendations (e.g., "Developer" - what stack?)
- Seniority level matters (e.g., "Engineer" - junior, mid, or senior?)
- Team/company context would help (e.g., "Analyst" - what kind of analysis?)

## When to Recommend Skills

Once you have enough context, provide exactly 6 skill keywords/phrases that are most critical for this role. These should be:
- Specific and actionable skill names
- Relevant to the role and context provided
- Covering a good mix: technical skills, soft skills, domain expertise
- **CRITICALLY IMPORTANT**: Each skill must be DISTINCT and NON-DUPLICATIVE
  - Do NOT recommend skills that are slight variations of the same thing (e.g., "Python" and "Python Programming" are duplicates)
  - Do NOT recommend skills with very similar titles or types (e.g., "Data Analysis" and "Data Analytics" are too similar)
  - Ensure each skill represents a UNIQUE and DIFFERENT competency area
  - Aim for a BROAD, COMPREHENSIVE cross-section that covers all core elements of the role
  - Think of skills as representing different dimensions of the role (e.g., technical, communication, domain knowledge, tools, methodologies, leadership)

## Examples of Good Skill Selection (Diverse and Non-Duplicative)

For a "Senior Full Stack Developer" role:
- ✅ "JavaScript Programming" (technical core)
- ✅ "System Architecture" (design/architecture)
- ✅ "Agile Methodologies" (process/methodology)
- ✅ "Code Review" (quality assurance)
- ✅ "API Design" (integration/interface)
- ✅ "Technical Leadership" (leadership/mentoring)

For a "Product Manager" role:
- ✅ "Product Strategy" (strategic planning)
- ✅ "User Research" (user understanding)
- ✅ "Stakeholder Management" (communication/coordination)
- ✅ "Data Analysis" (analytics/decision-making)
- ✅ "Agile Product Development" (process/methodology)
- ✅ "Roadmap Planning" (planning/execution)

## Examples of Bad Skill Selection (Duplicative or Too Similar)

❌ "Python", "Python Programming", "Python Development" (all the same skill)
❌ "Data Analysis", "Data Analytics", "Analytical Skills" (too similar)
❌ "Project Management", "Project Planning", "Managing Projects" (duplicates)
❌ "Communication", "Verbal Communication", "Written Communication" (too granular/variations)

## Response Format

Return ONLY valid JSON in one of these two formats:

**If you need more context:**
{
  "type": "follow_up",
  "question": "Your single, specific follow-up question here"
}

**If you're ready to recommend:**
{
  "type": "skills",
  "skills": ["Skill keyword 1", "Skill keyword 2", "Skill keyword 3", "Skill keyword 4", "Skill keyword 5", "Skill keyword 6"],
  "reasoning": "Brief explanation of why these skills are important for this role and how they represent diverse competency areas"
}

## Important Rules

- Ask only ONE follow-up question at a time
- Make questions specific and actionable
- When recommending skills, always provide exactly 6 skill keywords
- Use clear, searchable skill names (e.g., "Python Programming", "Project Management", "Data Analysis")
- **MANDATORY**: Ensure all 6 skills are DISTINCT and represent DIFFERENT competency areas - no duplicates or near-duplicates
- **MANDATORY**: Provide a BROAD cross-section that demonstrates all core elements of the role
- Return ONLY the JSON object, no markdown, no explanation outside the JSON

{{conversation_context}}
Analyze the role and either ask a follow-up question or recommend 6 skills.`;

// =============================================================================
// TEMPLATE HELPERS
// =============================================================================

export interface PromptVariables {
  [key: string]: string | number;
}

/**
 * Fill {{name}} placeholders. Values are inserted literally.
 */
export function buildPrompt(template: string, variables: PromptVariables): string {
  let result = template;

  for (const [key, value] of Object.entries(variables)) {
    const placeholder = `{{${key}}}`;
    const replacement = String(value);
    result = result.replace(
      new RegExp(placeholder.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'), 'g'),
      () => replacement
    );
  }

  return result;
}

/**
 * Final prompt text sent to the completion backend
 */
export function withJsonReminder(prompt: string): string {
  return `${prompt}\n\n${JSON_ONLY_REMINDER}`;
}
