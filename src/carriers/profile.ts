import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, describeError } from '../errors.js';

export const TRACKING_NUMBER_PLACEHOLDER = '{trackingNumber}';

const selector = z.string().trim().min(1);
const aliases = z.array(z.string().trim().min(1)).min(1);

export const carrierProfileSchema = z
  .object({
    code: z
      .string()
      .trim()
      .regex(/^[a-z0-9][a-z0-9_-]*$/, 'must be lowercase letters, digits, "-" or "_"'),
    name: z.string().trim().min(1),
    url: z.string().trim().url(),
    selectors: z.object({
      input: selector.optional(),
      submit: selector.optional(),
      consent: selector.optional(),
      results: selector,
      notFound: selector,
      headerCell: selector,
      row: selector,
      cell: selector,
    }),
    columns: z.object({
      timestamp: aliases,
      location: aliases,
      detail: aliases,
    }),
  })
  .refine(
    (profile) =>
      profile.url.includes(TRACKING_NUMBER_PLACEHOLDER) || profile.selectors.input !== undefined,
    {
      message: `selectors.input is required unless url contains ${TRACKING_NUMBER_PLACEHOLDER}`,
      path: ['selectors', 'input'],
    }
  );

export type CarrierProfile = z.infer<typeof carrierProfileSchema>;

export const carrierProfilesFileSchema = z
  .object({
    default: z.string().trim().min(1),
    carriers: z.array(carrierProfileSchema).min(1),
  })
  .superRefine((file, ctx) => {
    const codes = file.carriers.map((carrier) => carrier.code);
    codes.forEach((code, index) => {
      if (codes.indexOf(code) !== index) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate carrier code "${code}"`,
          path: ['carriers', index, 'code'],
        });
      }
    });
    if (!codes.includes(file.default)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `default carrier "${file.default}" is not defined`,
        path: ['default'],
      });
    }
  });

export type CarrierProfilesFile = z.infer<typeof carrierProfilesFileSchema>;

export interface ProfileOverrides {
  /** Replaces the default carrier's URL. */
  defaultCarrierUrl?: string;
}

function validate(raw: unknown): CarrierProfilesFile {
  const parsed = carrierProfilesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'profiles'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export function parseCarrierProfiles(
  raw: unknown,
  overrides: ProfileOverrides = {}
): CarrierProfilesFile {
  const file = validate(raw);
  const { defaultCarrierUrl } = overrides;
  if (!defaultCarrierUrl) return file;

  // Revalidate: a URL override can drop the placeholder a form-less carrier relies on.
  return validate({
    ...file,
    carriers: file.carriers.map((carrier) =>
      carrier.code === file.default ? { ...carrier, url: defaultCarrierUrl } : carrier
    ),
  });
}

export async function loadCarrierProfiles(
  path: string,
  overrides: ProfileOverrides = {}
): Promise<CarrierProfilesFile> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (err) {
    throw new ConfigError([`${path}: ${describeError(err)}`]);
  }
  return parseCarrierProfiles(raw, overrides);
}
