export type AccountTagValue = string | number | boolean;

/**
 * Account record as published by the account factory in the shared parameter
 * store. Field names follow the inventory's wire format.
 */
export interface AccountRecord {
  readonly account_name: string;
  readonly account_id: string;
  readonly account_tags?: Readonly<Record<string, AccountTagValue>>;
  readonly customer_values?: Readonly<Record<string, unknown>>;
  readonly ou_path?: string;
}

export interface ManagedPolicyReference {
  readonly managed_by: "aws" | "customer";
  readonly policy_name: string;
  readonly policy_path?: string;
}

export interface PermissionSetDefinition {
  readonly name: string;
  readonly description: string;
  readonly session_duration: number /** Session duration in hours */;
  readonly inline_policy_json?: string;
  readonly managed_policies?: ReadonlyArray<ManagedPolicyReference>;
  readonly boundary_policy?: ManagedPolicyReference;
}

/**
 * Groups (and optionally users) that receive a permission set on every
 * active account. Account specific principals are read from the account's
 * customer values under `sso_<role>_groups` and `sso_<role>_users`
 */
export interface GlobalGroupRule {
  readonly role: string;
  readonly permission_set_name: string;
  readonly groups: ReadonlyArray<string>;
  readonly users?: ReadonlyArray<string>;
}

export type GlobalGroupRules = ReadonlyArray<GlobalGroupRule>;

export type AccountFilter = (account: AccountRecord) => boolean;

export interface AssignmentPermission {
  readonly permission_set_name: string;
  readonly groups: Array<string>;
  readonly users: Array<string>;
}

export interface AssignmentEntry {
  readonly account_name: string;
  readonly account_id: string;
  readonly permissions: Array<AssignmentPermission>;
}

export interface ResolveOptions {
  /** Principal names that exist in the identity store (manual provisioning only) */
  readonly knownGroups?: ReadonlySet<string>;
  readonly knownUsers?: ReadonlySet<string>;
}

export interface ManualUser {
  readonly userName: string;
  readonly givenName: string;
  readonly familyName: string;
  readonly email?: string;
}

export interface ManualGroup {
  readonly groupName: string;
  readonly description?: string;
  readonly members: ReadonlyArray<string>;
}

export interface ManualProvisioningIdentities {
  readonly users: ReadonlyArray<ManualUser>;
  readonly groups: ReadonlyArray<ManualGroup>;
}

export interface CustomerManagedPolicyObject {
  readonly Name: string;
  readonly Path: string;
}

export type PermissionsBoundaryObject =
  | { readonly ManagedPolicyArn: string }
  | { readonly CustomerManagedPolicyReference: CustomerManagedPolicyObject };

/** Permission set shape handed to the provisioning module */
export interface PermissionSetPayload {
  readonly permissionSetName: string;
  readonly description: string;
  readonly sessionDuration: string;
  readonly managedPoliciesArnList: Array<string>;
  readonly customerManagedPoliciesList: Array<CustomerManagedPolicyObject>;
  readonly permissionsBoundary?: PermissionsBoundaryObject;
  readonly inlinePolicyDocument?: Record<string, unknown>;
}

/** Resource properties passed from the stack to the resolver custom resource */
export interface ResolverResourceProperties {
  readonly accountInventoryParamName: string;
  readonly accountInventoryParamRegion: string;
  readonly accountInventoryReaderRoleArn: string;
  readonly assignmentsParamName: string;
  readonly permissionSets: string;
  readonly globalGroupRules: string;
  readonly knownGroups: string;
  readonly knownUsers: string;
}

export enum requestStatus {
  InProgress = "InProgress",
  Completed = "Completed",
  FailedWithError = "FailedWithError",
  FailedWithException = "FailedWithException",
}

export enum logModes {
  Exception = "Exception",
  Info = "Info",
  Debug = "Debug",
  Warn = "Warn",
}

export interface LogMessage {
  readonly logMode: logModes;
  readonly handler: string;
  readonly requestId?: string;
  readonly status: requestStatus;
  readonly statusMessage?: string;
  readonly relatedData?: string;
}
