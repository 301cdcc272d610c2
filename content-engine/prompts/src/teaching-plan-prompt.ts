import { PromptPair, TeachingPlanPromptInput } from './types.js';

/**
 * Fixed title and tasks of the review session the caller appends after generation
 */
export const FINAL_REVIEW_ITEM = {
  title: 'Course Review and Assessment',
  tasks: '1. Final review\n2. Course assessment and feedback'
} as const;

const SYSTEM_PROMPT = 'You fill in the content of a teaching plan whose calendar has already been fixed.';

/**
 * Teaching-plan content: one JSON array entry per provided frame slot
 */
export function buildTeachingPlanPrompt(input: TeachingPlanPromptInput): PromptPair {
  const frame = JSON.stringify(input.contentFrame);
  const reviewRule = input.finalReview
    ? `\n5. Do NOT generate content for session ${input.actualClasses} (the final review and assessment). The system adds that session itself.`
    : '';

  const userPrompt = `Fill the teaching content into a fixed class schedule.

Input:
- Course name: ${input.courseName}
- Theory hours: ${input.theoryHours} (about ${input.theoryClasses} sessions)
- Practical hours: ${input.practiceHours} (about ${input.practiceClasses} sessions)
- Fixed schedule frame (read-only): ${frame}

Course catalog:
${input.courseCatalog}

Rules:
1. Follow the schedule frame exactly. Every entry keeps the "week" and "order" it was given; do not add, drop or move sessions.
2. Plan about ${input.theoryClasses} theory sessions and about ${input.practiceClasses} practical sessions, following the order of the course catalog.
3. Titles:
   - Theory sessions start with "Project N: " and practical sessions with "Practical-Project N: ", e.g. "Project 1: Computer Basics" or "Practical-Project 1: Word Processing".
   - Never add bracketed tags such as "[Theory]" or "[Practice]" anywhere in a title.
4. Tasks: a numbered list "1. ", "2. ", "3. " separated by newline characters, restarting at 1 for every entry. Do not use "Task 1" or "1-1".${reviewRule}

Output format (STRICT):
- Return ONLY a JSON array with one object per frame entry: {"week": int, "order": int, "title": string, "tasks": string, "hour": ${input.hourPerClass}}.
- Do not include any prose, comments, markdown, or code fences.`;

  return { systemPrompt: SYSTEM_PROMPT, userPrompt };
}
