// pattern: Functional Core
import { z } from "zod";
import { READ_ONLY_SCOPES } from "../gcp/scopes.ts";

const ServerConfigSchema = z.object({
  name: z.string().default("gcp-triage"),
  version: z.string().default("0.1.0"),
  mode: z.enum(["stdio", "sse"]).default("stdio"),
  host: z.string().default("0.0.0.0"),
  port: z.number().int().positive().default(8080),
  base_url: z.string().url().default("http://localhost:8080"),
});

const AuthConfigSchema = z
  .object({
    credentials_file: z.string().optional(),
    client_id: z.string().optional(),
    client_secret: z.string().optional(),
    refresh_token: z.string().optional(),
    scopes: z.array(z.string()).default([...READ_ONLY_SCOPES]),
  })
  .superRefine((data, ctx) => {
    if (!data.credentials_file && !(data.client_id && data.client_secret)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          "either GOOGLE_APPLICATION_CREDENTIALS or both GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set",
        path: ["credentials_file"],
      });
    }
  });

const ToolsConfigSchema = z.object({
  request_timeout_ms: z.number().int().positive().default(30000),
});

const AppConfigSchema = z.object({
  server: ServerConfigSchema.default({}),
  auth: AuthConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type AuthConfig = z.infer<typeof AuthConfigSchema>;
export type ToolsConfig = z.infer<typeof ToolsConfigSchema>;

export { AppConfigSchema, ServerConfigSchema, AuthConfigSchema, ToolsConfigSchema };
