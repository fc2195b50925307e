/**
 * Cluster status parsing
 *
 * Two tiers: the structured JSON document printed by `minikube status -o json`,
 * then a substring match on the raw text when the output is not that document.
 */

import { z } from 'zod';
import { Failure, Success, type Result } from '../domain/types/result';

export const RUNNING_TOKEN = 'Running';

const HostStatusSchema = z
  .object({
    Name: z.string().optional(),
    Host: z.string().optional(),
    Kubelet: z.string().optional(),
    APIServer: z.string().optional(),
  })
  .passthrough();

// multi-node clusters print one entry per node; the first is the control plane
const StatusDocumentSchema = z.union([HostStatusSchema, z.array(HostStatusSchema).nonempty()]);

export type StatusParseStrategy = 'structured' | 'fallback';

export interface ClusterStatus {
  running: boolean;
  strategy: StatusParseStrategy;
  host?: string;
}

export function parseJson(text: string): Result<unknown> {
  try {
    return Success(JSON.parse(text));
  } catch (error) {
    return Failure(error instanceof Error ? error.message : String(error));
  }
}

export function parseStructuredStatus(output: string): Result<ClusterStatus> {
  const json = parseJson(output);
  if (!json.ok) {
    return Failure(`Status output is not JSON: ${json.error}`);
  }

  const document = StatusDocumentSchema.safeParse(json.value);
  if (!document.success) {
    return Failure('Status output is not a status document');
  }

  const host = Array.isArray(document.data) ? document.data[0].Host : document.data.Host;
  return Success({ running: host === RUNNING_TOKEN, strategy: 'structured', host });
}

export function parseFallbackStatus(output: string): ClusterStatus {
  return { running: output.includes(RUNNING_TOKEN), strategy: 'fallback' };
}

export function parseClusterStatus(output: string): ClusterStatus {
  const structured = parseStructuredStatus(output);
  return structured.ok ? structured.value : parseFallbackStatus(output);
}
