import { z } from 'zod';
import { ControlPlaneResponseError } from '../core/errors';

export const tokenResponse = z.object({ access_token: z.string().min(1) });

export const environmentResponse = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  org_id: z.string().min(1),
  org_name: z.string(),
});

export const cpgwApiKeyResponse = z.object({
  id: z.string().min(1),
  key: z.string().min(1),
});

export const serviceAccountResponse = z.object({
  id: z.string().min(1),
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

export const projectResponse = z.object({ id: z.string().min(1) });

export const projectApiKeyResponse = z.object({
  key: z.object({
    id: z.string().min(1),
    project_id: z.string().min(1),
  }),
  value: z.string().min(1),
});

export const dnsDelegationResponse = z.object({
  change_id: z.string(),
  status: z.string(),
  fqdn: z.string().min(1),
});

export const dnsDelegationDeleteResponse = z.object({
  change_id: z.string(),
  status: z.string(),
});

export const ampAccessResponse = z.object({
  role_arn: z.string().min(1),
  remote_write_endpoint: z.string().min(1),
  region: z.string().min(1),
});

export const datadogApiKeyResponse = z.object({
  api_key: z.string().min(1),
  key_id: z.string().min(1),
});

export const datadogApiKeyDeleteResponse = z.object({ deleted: z.boolean() });

/** Validates a response body, raising a contract error naming the operation. */
export function parseResponse<T extends z.ZodTypeAny>(schema: T, body: unknown, operation: string): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ControlPlaneResponseError(operation, body, issues);
  }
  return result.data;
}
