import { z } from "zod";

/**
 * Header settings. Values arrive as strings from the config file.
 */
export const settingsSchema = z.object({
  host: z.string({ required_error: "host" }).trim().min(1, "host"),
  path: z.string({ required_error: "path" }).trim().min(1, "path"),
  port: z.coerce.number().int().positive().optional(),
  identity: z.string().min(1).optional(),
});

export type ShipitSettings = z.infer<typeof settingsSchema>;

/**
 * One `[name]` or `[name:local]` block
 */
export interface Section {
  name: string;
  isLocalVariant: boolean;
  body: string;
}

export interface ConfigDocument {
  /** Every key of the header block, verbatim */
  header: Record<string, string>;
  sections: Section[];
  settings: ShipitSettings;
}
