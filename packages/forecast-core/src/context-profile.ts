import type { TaskInstance } from './types.js';

/**
 * Optional text fields a task instance can carry, in prompt order
 */
export const CONTEXT_FIELDS = ['background', 'constraints', 'scenario'] as const;

export type ContextField = (typeof CONTEXT_FIELDS)[number];

/**
 * Which context fields are exposed to the model
 */
export interface ContextProfile {
  id: string;
  fields: ReadonlySet<ContextField>;
}

function profile(id: string, fields: ContextField[]): ContextProfile {
  return { id, fields: new Set(fields) };
}

export const CONTEXT_PROFILES = {
  none: profile('none', []),
  background: profile('background', ['background']),
  constraints: profile('constraints', ['constraints']),
  scenario: profile('scenario', ['scenario']),
  'background+scenario': profile('background+scenario', ['background', 'scenario']),
  full: profile('full', ['background', 'constraints', 'scenario']),
} satisfies Record<string, ContextProfile>;

export type ContextProfileId = keyof typeof CONTEXT_PROFILES;

/**
 * Type guard for profile ids coming from the command line
 * @param value - Candidate profile id
 */
export function isContextProfileId(value: string): value is ContextProfileId {
  return Object.hasOwn(CONTEXT_PROFILES, value);
}

/**
 * Return a copy of the task with every context field outside the profile removed
 * @param task - Source task instance
 * @param contextProfile - Fields to keep
 * @returns Filtered task instance
 */
export function applyContextProfile(task: TaskInstance, contextProfile: ContextProfile): TaskInstance {
  const { background, constraints, scenario, ...rest } = task;
  const values: Record<ContextField, string | undefined> = { background, constraints, scenario };

  const kept: Partial<Record<ContextField, string>> = {};
  for (const field of CONTEXT_FIELDS) {
    // eslint-disable-next-line security/detect-object-injection -- field is a typed ContextField
    const value = values[field];
    if (value !== undefined && contextProfile.fields.has(field)) {
      // eslint-disable-next-line security/detect-object-injection -- field is a typed ContextField
      kept[field] = value;
    }
  }

  return { ...rest, ...kept };
}
