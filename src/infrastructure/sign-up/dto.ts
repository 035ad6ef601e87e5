import { z } from 'zod';

/**
 * Wire shapes of the sign-up endpoint.
 *
 * Request bodies are built from validated domain data, so they are plain types.
 * Response bodies come from outside and are parsed with these schemas.
 */

/** Exactly one of `email` / `phoneNumber` is present. */
export type SignUpBody =
  | { readonly name: string; readonly email: string; readonly phoneNumber?: undefined }
  | { readonly name: string; readonly phoneNumber: string; readonly email?: undefined };

export const SignUpResultDtoSchema = z.object({
  token: z.string(),
});

export type SignUpResultDto = z.infer<typeof SignUpResultDtoSchema>;

export const FormFieldDtoSchema = z.object({
  field: z.string(),
  errors: z.array(z.string()),
});

export type FormFieldDto = z.infer<typeof FormFieldDtoSchema>;

export const SignUpErrorDtoSchema = z.object({
  message: z.string(),
  errors: z.array(FormFieldDtoSchema).default([]),
});

export type SignUpErrorDto = z.infer<typeof SignUpErrorDtoSchema>;
