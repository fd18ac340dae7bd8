import { z } from "zod";

export const ConfigSchema = z.object({
  mcEndpoint: z.string().min(1).optional(),
  token: z.string().min(1).optional(),
  oidcAgentAccount: z.string().min(1).optional(),
  issuer: z.string().min(1).optional(),
  insecure: z.boolean().default(false),
  timeoutMs: z.number().int().positive().default(3050),
  cacheEnabled: z.boolean().default(true),
  cacheTtlSeconds: z.number().int().nonnegative().default(300),
  validateTokenLength: z.boolean().default(true),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("warn"),
  logToFile: z.boolean().default(false)
});

export type Config = z.infer<typeof ConfigSchema>;

export const SERVICE_SIGNATURE =
  "This is the user API for mapping remote identities to local identities.";

export const AccountStateSchema = z.enum([
  "not_deployed",
  "pending",
  "deployed",
  "limited",
  "suspended",
  "unknown"
]);

export type AccountState = z.infer<typeof AccountStateSchema>;

export const ServiceRootSchema = z
  .object({
    description: z.string().optional()
  })
  .passthrough();

export const ServiceInfoSchema = z
  .object({
    "supported OPs": z.array(z.string()).default([])
  })
  .passthrough();

export type ServiceInfo = z.infer<typeof ServiceInfoSchema>;

// state is kept open here; narrowing to AccountState happens in the resolver
export const StatusResponseSchema = z
  .object({
    state: z.string(),
    message: z.string().optional()
  })
  .passthrough();

export type StatusResponse = z.infer<typeof StatusResponseSchema>;

export const DeployResponseSchema = z
  .object({
    state: z.string().optional(),
    message: z.string().optional(),
    credentials: z
      .object({
        ssh_user: z.string().min(1)
      })
      .passthrough()
  })
  .passthrough();

export type DeployResponse = z.infer<typeof DeployResponseSchema>;

export const ErrorResponseSchema = z.object({
  state: z.string(),
  message: z.string()
});

export type TokenSource =
  | { kind: "explicit"; token: string }
  | { kind: "agent-account"; account: string }
  | { kind: "agent-issuer"; issuer: string }
  | { kind: "service-issuer"; issuer: string };

export interface SelectedToken {
  token: string;
  source: TokenSource;
  provenance: string;
}

export interface CredentialOptions {
  token?: string;
  agentAccount?: string;
  issuer?: string;
  verify: boolean;
  validateLength?: boolean;
}

export interface RemoteOperand {
  original: string;
  remote: boolean;
  host?: string;
  user?: string;
  port?: number;
  path: string;
  uri: boolean;
}

export interface ScpCommand {
  options: string[];
  sources: RemoteOperand[];
  target: RemoteOperand;
}

export interface ResolvedCredential {
  username: string;
  token: string;
  provenance: string;
}

export interface AugmentedScpCommand {
  args: string[];
  tokens: string[];
  provenances: string[];
}
