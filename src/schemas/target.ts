import { z } from "zod";
import { ComponentError } from "../lifecycle/errors.js";

export const AuthMethodSchema = z.enum(["None", "CHAP"]);

/** One record of the target descriptor file (config/iscsi_targets.json). */
export const TargetRecordSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(""),
    iqn: z.string().min(1),
    ip: z.string().min(1),
    port: z.number().int().positive().default(3260),
    lun: z.number().int().nonnegative().default(0),
    auth_method: AuthMethodSchema.default("None"),
    chap_username: z.string().optional(),
    chap_secret: z.string().optional(),
  })
  .strict()
  .superRefine((record, ctx) => {
    if (record.auth_method === "CHAP" && (!record.chap_username || !record.chap_secret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["chap_username"],
        message: "CHAP requires chap_username and chap_secret",
      });
    }
  });

export const TargetsFileSchema = z
  .object({ targets: z.array(TargetRecordSchema) })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.targets.forEach((t, i) => {
      if (seen.has(t.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["targets", i, "name"],
          message: `Duplicate target name "${t.name}"`,
        });
      }
      seen.add(t.name);
    });
  });

/**
 * Identity of a remote boot resource. The secondary_* fields describe the second
 * path of a multipath pair and must resolve to the same logical volume.
 */
export const BootTargetDescriptorSchema = z
  .object({
    iqn: z.string().min(1),
    portal_address: z.string().min(1),
    port: z.number().int().positive().default(3260),
    lun: z.number().int().nonnegative().default(0),
    secondary_iqn: z.string().min(1).optional(),
    secondary_portal: z.string().min(1).optional(),
    secondary_port: z.number().int().positive().optional(),
    secondary_lun: z.number().int().nonnegative().optional(),
    chap_username: z.string().min(1).optional(),
    chap_secret: z.string().min(1).optional(),
    secondary_chap_username: z.string().min(1).optional(),
    secondary_chap_secret: z.string().min(1).optional(),
  })
  .strict()
  .superRefine((d, ctx) => {
    if (d.secondary_portal !== undefined) {
      if (d.secondary_iqn !== undefined && d.secondary_iqn !== d.iqn) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["secondary_iqn"],
          message: `multipath secondary iqn ${d.secondary_iqn} differs from primary ${d.iqn}`,
        });
      }
      if (d.secondary_lun !== undefined && d.secondary_lun !== d.lun) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["secondary_lun"],
          message: `multipath secondary lun ${d.secondary_lun} differs from primary ${d.lun}`,
        });
      }
    } else if (d.secondary_iqn !== undefined || d.secondary_lun !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["secondary_portal"],
        message: "secondary_portal is required for multipath",
      });
    }
    if ((d.chap_username === undefined) !== (d.chap_secret === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["chap_username"],
        message: "chap_username and chap_secret must be set together",
      });
    }
  });

export type AuthMethod = z.infer<typeof AuthMethodSchema>;
export type TargetRecord = z.infer<typeof TargetRecordSchema>;
export type TargetsFile = z.infer<typeof TargetsFileSchema>;
export type BootTargetDescriptor = z.infer<typeof BootTargetDescriptorSchema>;
export type BootTargetDescriptorInput = z.input<typeof BootTargetDescriptorSchema>;

function configurationError(what: string, error: z.ZodError): ComponentError {
  const issues = error.issues
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
  return new ComponentError("CONFIGURATION", `Invalid ${what}: ${issues}`);
}

/** Validate a descriptor, multipath invariant included. Raises CONFIGURATION. */
export function parseDescriptor(input: BootTargetDescriptorInput): BootTargetDescriptor {
  const parsed = BootTargetDescriptorSchema.safeParse(input);
  if (!parsed.success) throw configurationError("boot target descriptor", parsed.error);
  return parsed.data;
}

export function parseTargetsFile(input: unknown): TargetsFile {
  const parsed = TargetsFileSchema.safeParse(input);
  if (!parsed.success) throw configurationError("targets file", parsed.error);
  return parsed.data;
}

export function isMultipath(d: BootTargetDescriptor): boolean {
  return d.secondary_portal !== undefined;
}

/**
 * Build a descriptor from one or two target records. A secondary record must
 * point at the same iqn and lun as the primary.
 */
export function descriptorFromRecords(
  primary: TargetRecord,
  secondary?: TargetRecord,
): BootTargetDescriptor {
  const input: BootTargetDescriptorInput = {
    iqn: primary.iqn,
    portal_address: primary.ip,
    port: primary.port,
    lun: primary.lun,
  };
  if (primary.auth_method === "CHAP") {
    input.chap_username = primary.chap_username;
    input.chap_secret = primary.chap_secret;
  }
  if (secondary) {
    input.secondary_iqn = secondary.iqn;
    input.secondary_portal = secondary.ip;
    input.secondary_port = secondary.port;
    input.secondary_lun = secondary.lun;
    if (secondary.auth_method === "CHAP") {
      input.secondary_chap_username = secondary.chap_username;
      input.secondary_chap_secret = secondary.chap_secret;
    }
  }
  return parseDescriptor(input);
}
