/**
 * Objective: Resolve which groups (and users) receive which permission sets on
 * which accounts of the account inventory
 *
 * - Validate accounts, permission sets and rules; any issue aborts the whole
 *   resolution with one ConfigurationError
 * - Skip accounts rejected by the filter (decommissioned accounts by default)
 * - For every rule, merge the global principals with the account specific
 *   principals found in the account's customer values
 */

import {
  AccountFilter,
  AccountRecord,
  AssignmentEntry,
  GlobalGroupRule,
  GlobalGroupRules,
  PermissionSetDefinition,
  ResolveOptions,
} from "./interfaces";
import { collectPermissionSetIssues } from "./permissionSets";
import { ConfigurationError, ConfigurationIssue } from "./payload-validator";

export const decommissionTagKey = "AccountDecommission";

export const accountGroupsKey = (role: string) => `sso_${role}_groups`;
export const accountUsersKey = (role: string) => `sso_${role}_users`;

export const isActiveAccount: AccountFilter = (account) => {
  const flag = account.account_tags?.[decommissionTagKey];
  if (typeof flag === "boolean") {
    return !flag;
  }
  if (typeof flag === "number") {
    return flag === 0;
  }
  if (typeof flag === "string") {
    return flag.trim().toLowerCase() !== "true";
  }
  return true;
};

export const allOf =
  (...filters: AccountFilter[]): AccountFilter =>
  (account) =>
    filters.every((filter) => filter(account));

const isNonEmptyString = (value: unknown): value is string =>
  typeof value === "string" && value.trim().length > 0;

const isStringList = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

/** Missing lists resolve to an empty list, anything else must be a string list */
function accountPrincipals(
  account: AccountRecord,
  key: string,
  issues: ConfigurationIssue[]
): ReadonlyArray<string> {
  const value = account.customer_values?.[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!isStringList(value)) {
    issues.push({
      errorCode: "invalid_customer_value",
      message: `Account ${account.account_name} has customer value ${key} that is not a list of strings`,
    });
    return [];
  }
  return value;
}

const union = (...lists: ReadonlyArray<string>[]): Array<string> => [
  ...new Set(lists.flat()),
];

function collectAccountIssues(
  accounts: ReadonlyArray<AccountRecord>
): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];
  const seenIds = new Set<string>();
  const seenNames = new Set<string>();

  accounts.forEach((account, index) => {
    if (!isNonEmptyString(account.account_id)) {
      issues.push({
        errorCode: "missing_account_id",
        message: `Account at position ${index} - account_id does not exist or is empty`,
      });
    } else if (seenIds.has(account.account_id)) {
      issues.push({
        errorCode: "duplicate_account_id",
        message: `Account id ${account.account_id} appears more than once in the inventory`,
      });
    } else {
      seenIds.add(account.account_id);
    }

    if (!isNonEmptyString(account.account_name)) {
      issues.push({
        errorCode: "missing_account_name",
        message: `Account at position ${index} - account_name does not exist or is empty`,
      });
    } else if (seenNames.has(account.account_name)) {
      issues.push({
        errorCode: "duplicate_account_name",
        message: `Account name ${account.account_name} appears more than once in the inventory`,
      });
    } else {
      seenNames.add(account.account_name);
    }
  });

  return issues;
}

/**
 * Rule issues, checked against the permission set names that are defined. A
 * permission set is assigned by one role only, so a principal appears once
 * per (account, permission set)
 */
export function collectRuleIssues(
  globalRules: GlobalGroupRules,
  permissionSets: ReadonlyArray<PermissionSetDefinition>
): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];
  const definedNames = new Set(permissionSets.map(({ name }) => name));
  const seenRoles = new Set<string>();
  const referencedNames = new Set<string>();

  for (const rule of globalRules) {
    if (!isNonEmptyString(rule.role)) {
      issues.push({
        errorCode: "missing_role",
        message: `Rule for permission set ${rule.permission_set_name} - role does not exist or is empty`,
      });
    } else if (seenRoles.has(rule.role)) {
      issues.push({
        errorCode: "duplicate_role",
        message: `Role ${rule.role} is configured more than once`,
      });
    } else {
      seenRoles.add(rule.role);
    }

    if (!definedNames.has(rule.permission_set_name)) {
      issues.push({
        errorCode: "unknown_permission_set",
        message: `Role ${rule.role} references permission set ${rule.permission_set_name} which is not defined`,
      });
    } else if (referencedNames.has(rule.permission_set_name)) {
      issues.push({
        errorCode: "duplicate_permission_set_reference",
        message: `Role ${rule.role} references permission set ${rule.permission_set_name} which another role already assigns`,
      });
    } else {
      referencedNames.add(rule.permission_set_name);
    }
  }

  return issues;
}

function collectUnknownPrincipals(
  account: AccountRecord,
  rule: GlobalGroupRule,
  principals: ReadonlyArray<string>,
  known: ReadonlySet<string> | undefined,
  principalType: "group" | "user",
  issues: ConfigurationIssue[]
) {
  if (!known) {
    return;
  }
  for (const principal of principals) {
    if (!known.has(principal)) {
      issues.push({
        errorCode: `unknown_${principalType}`,
        message: `Account ${account.account_name} assigns ${rule.permission_set_name} to ${principalType} ${principal} which is not provisioned`,
      });
    }
  }
}

/**
 * Resolves the account assignments for one snapshot of the account inventory.
 * The function is pure: identical input yields identical output, and either
 * the complete list is returned or a ConfigurationError is thrown
 */
export function resolveAssignments(
  accounts: ReadonlyArray<AccountRecord>,
  permissionSets: ReadonlyArray<PermissionSetDefinition>,
  globalRules: GlobalGroupRules,
  filter: AccountFilter = isActiveAccount,
  options: ResolveOptions = {}
): AssignmentEntry[] {
  const issues: ConfigurationIssue[] = [
    ...collectPermissionSetIssues(permissionSets),
    ...collectRuleIssues(globalRules, permissionSets),
    ...collectAccountIssues(accounts),
  ];
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  const assignments: AssignmentEntry[] = accounts
    .filter((account) => filter(account))
    .map((account) => ({
      account_name: account.account_name,
      account_id: account.account_id,
      permissions: globalRules.map((rule) => {
        const groups = union(
          rule.groups,
          accountPrincipals(account, accountGroupsKey(rule.role), issues)
        );
        const users = union(
          rule.users ?? [],
          accountPrincipals(account, accountUsersKey(rule.role), issues)
        );
        collectUnknownPrincipals(
          account,
          rule,
          groups,
          options.knownGroups,
          "group",
          issues
        );
        collectUnknownPrincipals(
          account,
          rule,
          users,
          options.knownUsers,
          "user",
          issues
        );
        return {
          permission_set_name: rule.permission_set_name,
          groups,
          users,
        };
      }),
    }));

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return assignments;
}
