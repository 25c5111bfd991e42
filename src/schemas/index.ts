import { z } from "zod";

// Locale and variant names become file names and XML text:
// no path separators, no whitespace, never "." or ".."
const identifier = (label: string) =>
  z
    .string()
    .min(1, { message: `${label} must not be empty` })
    .regex(/^[^/\\\s]+$/, {
      message: `${label} must not contain path separators or whitespace`,
    })
    .refine((value) => value !== "." && value !== "..", {
      message: `${label} must not be "." or ".."`,
    });

export const LocaleIdSchema = identifier("Locale");
export type LocaleId = z.infer<typeof LocaleIdSchema>;

export const VariantNameSchema = identifier("Variant");
export type VariantName = z.infer<typeof VariantNameSchema>;

// A layout ready to be installed: metadata plus the xkb_symbols text
export const LayoutDefinitionSchema = z.object({
  locale: LocaleIdSchema,
  variant: VariantNameSchema,
  description: z.string().refine((value) => value.trim().length > 0, {
    message: "Description cannot be blank",
  }),
  body: z.string(),
});
export type LayoutDefinition = z.infer<typeof LayoutDefinitionSchema>;

// Environment variables that locate the XKB trees (empty means unset)
const optionalEnv = z
  .string()
  .optional()
  .transform((value) => value || undefined);

export const XkbEnvSchema = z.object({
  XKB_CONFIG_ROOT: optionalEnv,
  XDG_CONFIG_HOME: optionalEnv,
  XDG_SESSION_TYPE: optionalEnv,
});
export type XkbEnv = z.infer<typeof XkbEnvSchema>;
