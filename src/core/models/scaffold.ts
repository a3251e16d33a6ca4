/**
 * Scaffolding State Types
 */

/**
 * Support level for the open question.
 *
 * 0 = question just opened, 1 = targeted hint, 2 = analogy,
 * 3 = multiple choice, 4 = direct answer with explanation.
 */
export type ScaffoldLevel = 0 | 1 | 2 | 3 | 4;

export const MAX_SCAFFOLD_LEVEL = 4;

/**
 * Per-thread scaffolding state. `attempts` counts evaluated answer attempts
 * on the thread; meta questions never change it.
 */
export interface ScaffoldState {
  level: ScaffoldLevel;
  attempts: number;
  resolved: boolean;
}

/**
 * Support strategy a level maps to.
 */
export type ScaffoldStrategy =
  | 'opening'
  | 'hint'
  | 'analogy'
  | 'multiple_choice'
  | 'direct_answer';
