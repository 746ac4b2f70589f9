import { z } from 'zod';

export const DEFAULT_MAX_CLAIMS = 5;
export const MAX_CLAIMS_LIMIT = 10;
export const MAX_TEXT_LENGTH = 20000;

// MIP-003 forms send every value as a string and leave unfilled fields blank.
const ClaimLimitSchema = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z
    .union([
      z.number(),
      z
        .string()
        .regex(/^\d+$/, 'must be a whole number')
        .transform((value) => Number(value)),
    ])
    .pipe(z.number().int().min(1).max(MAX_CLAIMS_LIMIT))
    .optional(),
);

export const JobInputDataSchema = z.object({
  text: z.string().trim().min(1, 'text must not be empty').max(MAX_TEXT_LENGTH),
  max_claims: ClaimLimitSchema,
});

export const StartJobSchema = z.object({
  identifier_from_purchaser: z.string().trim().min(1),
  input_data: JobInputDataSchema,
});

export type StartJobInput = z.infer<typeof StartJobSchema>;

export type InputFieldType = 'string' | 'number' | 'boolean' | 'option';

export interface InputFieldDefinition {
  readonly id: string;
  readonly type: InputFieldType;
  readonly name: string;
  readonly data: {
    readonly description: string;
    readonly placeholder?: string;
  };
  readonly validations?: readonly { readonly validation: string; readonly value: string }[];
}

/** Field list served from `GET /input_schema`. Mirrors {@link JobInputDataSchema}. */
export const INPUT_FIELDS: readonly InputFieldDefinition[] = [
  {
    id: 'text',
    type: 'string',
    name: 'Text to verify',
    data: {
      description: 'The text to summarize, fact-check and assess for bias',
      placeholder: 'Paste an article, post or statement...',
    },
    validations: [
      { validation: 'min', value: '1' },
      { validation: 'max', value: String(MAX_TEXT_LENGTH) },
    ],
  },
  {
    id: 'max_claims',
    type: 'number',
    name: 'Maximum claims',
    data: {
      description: `Upper bound on extracted key claims (1-${String(MAX_CLAIMS_LIMIT)}, default ${String(DEFAULT_MAX_CLAIMS)})`,
      placeholder: String(DEFAULT_MAX_CLAIMS),
    },
    validations: [
      { validation: 'optional', value: 'true' },
      { validation: 'min', value: '1' },
      { validation: 'max', value: String(MAX_CLAIMS_LIMIT) },
    ],
  },
];
