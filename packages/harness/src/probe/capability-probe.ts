/**
 * Capability Probe
 *
 * Decides up front whether the live scenarios can run here. Missing
 * prerequisites produce a `skip` decision with reasons instead of a thrown
 * error, so test suites can gate on the result.
 *
 * @module @dicom-it/harness/probe
 */

import { type HarnessConfig, errorMessage } from '@dicom-it/core';
import { type CredentialProvider, GoogleCredentialProvider } from '@dicom-it/connectors';

export type ProbeDecision = 'run' | 'skip';

export interface ProbeResult {
  decision: ProbeDecision;
  /** Why the decision is `skip`; empty when `run` */
  reasons: string[];
}

export interface ProbeDeps {
  /** Defaults to Application Default Credentials */
  credentials?: CredentialProvider;
}

export async function probeCapabilities(config: HarnessConfig, deps: ProbeDeps = {}): Promise<ProbeResult> {
  const reasons: string[] = [];

  if (!config.integration) {
    reasons.push('integration runs are disabled (set DICOM_IT_INTEGRATION=1)');
  }
  if (!config.project) {
    reasons.push('no project configured (set DICOM_IT_PROJECT or GOOGLE_CLOUD_PROJECT)');
  }
  if (!config.bucket) {
    reasons.push('no bucket configured (set DICOM_IT_BUCKET)');
  }

  // Only ask for a token once everything else is in place
  if (reasons.length === 0) {
    const credentials = deps.credentials ?? new GoogleCredentialProvider({ projectId: config.project });
    const tokenProblem = await credentials.getAccessToken().then(
      () => undefined,
      (error: unknown) => errorMessage(error)
    );
    if (tokenProblem !== undefined) {
      reasons.push(`no access token available: ${tokenProblem}`);
    }
  }

  return { decision: reasons.length === 0 ? 'run' : 'skip', reasons };
}
