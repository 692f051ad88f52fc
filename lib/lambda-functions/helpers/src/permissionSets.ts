import {
  CustomerManagedPolicyObject,
  ManagedPolicyReference,
  PermissionSetDefinition,
  PermissionSetPayload,
  PermissionsBoundaryObject,
} from "./interfaces";
import { hoursToISODuration } from "./isoDurationUtility";
import { ConfigurationError, ConfigurationIssue } from "./payload-validator";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const policyPath = (reference: ManagedPolicyReference): string =>
  reference.policy_path && reference.policy_path.length > 0
    ? reference.policy_path
    : "/";

function parseInlinePolicy(
  definition: PermissionSetDefinition
): Record<string, unknown> | undefined {
  const inlinePolicy = definition.inline_policy_json?.trim();
  if (!inlinePolicy) {
    return undefined;
  }
  const parsed: unknown = JSON.parse(inlinePolicy);
  if (!isRecord(parsed)) {
    throw new SyntaxError("inline policy is not a JSON object");
  }
  return parsed;
}

function collectPolicyReferenceIssues(
  permissionSetName: string,
  reference: ManagedPolicyReference,
  issues: ConfigurationIssue[]
) {
  if (reference.managed_by !== "aws" && reference.managed_by !== "customer") {
    issues.push({
      errorCode: "invalid_policy_reference",
      message: `Permission set ${permissionSetName} references a policy with managed_by ${reference.managed_by}, expected one of ["aws","customer"]`,
    });
  }
  if (!reference.policy_name || reference.policy_name.trim().length === 0) {
    issues.push({
      errorCode: "invalid_policy_reference",
      message: `Permission set ${permissionSetName} references a policy without a policy_name`,
    });
  }
}

/** Collects every issue in the permission set definitions without throwing */
export function collectPermissionSetIssues(
  definitions: ReadonlyArray<PermissionSetDefinition>
): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];
  const seenNames = new Set<string>();

  for (const definition of definitions) {
    if (!definition.name || definition.name.trim().length === 0) {
      issues.push({
        errorCode: "missing_permission_set_name",
        message: "Permission set name does not exist or is empty",
      });
      continue;
    }
    if (seenNames.has(definition.name)) {
      issues.push({
        errorCode: "duplicate_permission_set",
        message: `Permission set ${definition.name} is defined more than once`,
      });
    }
    seenNames.add(definition.name);

    if (
      !Number.isInteger(definition.session_duration) ||
      definition.session_duration <= 0
    ) {
      issues.push({
        errorCode: "invalid_session_duration",
        message: `Permission set ${definition.name} has session_duration ${definition.session_duration}, expected a positive number of hours`,
      });
    }

    try {
      parseInlinePolicy(definition);
    } catch (e) {
      issues.push({
        errorCode: "invalid_inline_policy",
        message: `Permission set ${definition.name} has an inline_policy_json that is not a JSON object`,
      });
    }

    for (const reference of definition.managed_policies ?? []) {
      collectPolicyReferenceIssues(definition.name, reference, issues);
    }
    if (definition.boundary_policy) {
      collectPolicyReferenceIssues(
        definition.name,
        definition.boundary_policy,
        issues
      );
    }
  }

  return issues;
}

export function validatePermissionSets(
  definitions: ReadonlyArray<PermissionSetDefinition>
) {
  const issues = collectPermissionSetIssues(definitions);
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
}

export const awsManagedPolicyArn = (reference: ManagedPolicyReference) =>
  `arn:aws:iam::aws:policy${policyPath(reference)}${reference.policy_name}`;

const customerManagedPolicy = (
  reference: ManagedPolicyReference
): CustomerManagedPolicyObject => ({
  Name: reference.policy_name,
  Path: policyPath(reference),
});

function renderBoundary(
  reference: ManagedPolicyReference
): PermissionsBoundaryObject {
  if (reference.managed_by === "aws") {
    return { ManagedPolicyArn: awsManagedPolicyArn(reference) };
  }
  return { CustomerManagedPolicyReference: customerManagedPolicy(reference) };
}

/**
 * Converts a validated permission set definition into the payload consumed by
 * the provisioning module. Managed policy order is preserved
 */
export function renderPermissionSet(
  definition: PermissionSetDefinition
): PermissionSetPayload {
  const managedPolicies = definition.managed_policies ?? [];
  const inlinePolicyDocument = parseInlinePolicy(definition);

  return {
    permissionSetName: definition.name,
    description: definition.description,
    sessionDuration: hoursToISODuration(definition.session_duration),
    managedPoliciesArnList: managedPolicies
      .filter((reference) => reference.managed_by === "aws")
      .map(awsManagedPolicyArn),
    customerManagedPoliciesList: managedPolicies
      .filter((reference) => reference.managed_by === "customer")
      .map(customerManagedPolicy),
    ...(definition.boundary_policy && {
      permissionsBoundary: renderBoundary(definition.boundary_policy),
    }),
    ...(inlinePolicyDocument && { inlinePolicyDocument }),
  };
}
