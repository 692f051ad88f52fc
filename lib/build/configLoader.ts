/**
 * Reads and validates the environment specific YAML configuration at
 * synthesis time. Any problem stops the synthesis before a template is
 * produced
 */

import { readFileSync } from "fs";
import { dirname, resolve } from "path";
import { collectRuleIssues } from "../lambda-functions/helpers/src/assignmentResolver";
import {
  logModes,
  ManualGroup,
  ManualProvisioningIdentities,
  ManualUser,
} from "../lambda-functions/helpers/src/interfaces";
import {
  ConfigurationError,
  ConfigurationIssue,
  imperativeParseJSON,
} from "../lambda-functions/helpers/src/payload-validator";
import { validatePermissionSets } from "../lambda-functions/helpers/src/permissionSets";
import {
  globalGroupRulesValidate,
  permissionSetsValidate,
} from "../lambda-functions/helpers/src/schemaValidators";
import { outputId } from "../constructs/helpers";
import { BuildConfig } from "./buildConfig";
import yaml = require("js-yaml");

type ConfigObject = Record<string, unknown>;

const functionLogModes: Record<string, logModes> = {
  INFO: logModes.Info,
  WARN: logModes.Warn,
  DEBUG: logModes.Debug,
  EXCEPTION: logModes.Exception,
};

function ensureObject(value: unknown, propName: string): ConfigObject {
  if (typeof value !== "object" || value === null || Array.isArray(value))
    throw new Error(propName + " does not exist or is not a mapping");
  const object: ConfigObject = {};
  Object.entries(value).forEach(([key, entry]) => {
    object[`${key}`] = entry;
  });
  return object;
}

export function ensureString(object: ConfigObject, propName: string): string {
  const value = object[`${propName}`];
  if (typeof value !== "string" || value.trim().length === 0)
    throw new Error(propName + " does not exist or is empty");
  return value;
}

export function ensureOptionalString(
  object: ConfigObject,
  propName: string
): string {
  const value = object[`${propName}`];
  if (value === undefined || value === null) return "";
  if (typeof value !== "string")
    throw new Error(propName + " is of not the correct data type");
  return value;
}

export function ensureValidString(
  object: ConfigObject,
  propName: string,
  validList: Array<string>
): string {
  const value = ensureString(object, propName);
  if (!validList.includes(value.toUpperCase())) {
    throw new Error(
      `${propName} is not one of the valid values - ${validList.toString()}`
    );
  }
  return value;
}

export function ensureBoolean(object: ConfigObject, propName: string): boolean {
  const value = object[`${propName}`];
  if (typeof value !== "boolean")
    throw new Error(
      propName + " does not exist or is of not the correct data type"
    );
  return value;
}

export function ensureStringList(
  object: ConfigObject,
  propName: string
): Array<string> {
  const value = object[`${propName}`];
  if (value === undefined || value === null) return [];
  if (
    !Array.isArray(value) ||
    !value.every((item) => typeof item === "string" && item.trim().length > 0)
  )
    throw new Error(propName + " is not a list of non empty strings");
  return value;
}

/** Maps the configured FunctionLogMode to the value the logger understands */
export function toFunctionLogMode(functionLogMode: string): logModes {
  const logMode = functionLogModes[functionLogMode.toUpperCase()];
  if (!logMode)
    throw new Error(
      `FunctionLogMode is not one of the valid values - ${Object.keys(functionLogModes).toString()}`
    );
  return logMode;
}

function readYaml(filePath: string): unknown {
  return yaml.load(readFileSync(filePath, "utf8"));
}

/**
 * Loads the users and groups file used when identities are not synchronised
 * through SCIM. Group members must reference users listed in the same file
 */
export function loadManualProvisioning(
  filePath: string
): ManualProvisioningIdentities {
  const unparsed = ensureObject(readYaml(filePath), filePath);

  const usersList = unparsed["Users"] ?? [];
  const groupsList = unparsed["Groups"] ?? [];
  if (!Array.isArray(usersList) || !Array.isArray(groupsList))
    throw new Error("Users and Groups must be lists in " + filePath);

  const users: ManualUser[] = usersList.map((entry: unknown, index: number) => {
    const user = ensureObject(entry, `Users[${index}]`);
    const email = ensureOptionalString(user, "Email");
    return {
      userName: ensureString(user, "UserName"),
      givenName: ensureString(user, "GivenName"),
      familyName: ensureString(user, "FamilyName"),
      ...(email.length > 0 && { email }),
    };
  });

  const groups: ManualGroup[] = groupsList.map(
    (entry: unknown, index: number) => {
      const group = ensureObject(entry, `Groups[${index}]`);
      const description = ensureOptionalString(group, "Description");
      return {
        groupName: ensureString(group, "GroupName"),
        ...(description.length > 0 && { description }),
        members: ensureStringList(group, "Members"),
      };
    }
  );

  const userNames = new Set(users.map(({ userName }) => userName));
  const issues = groups.flatMap((group) =>
    group.members
      .filter((member) => !userNames.has(member))
      .map((member) => ({
        errorCode: "unknown_group_member",
        message: `Group ${group.groupName} lists member ${member} which is not a defined user`,
      }))
  );
  const userNamesList = users.map(({ userName }) => userName);
  userNamesList
    .filter((userName, index) => userNamesList.indexOf(userName) !== index)
    .forEach((userName) =>
      issues.push({
        errorCode: "duplicate_user",
        message: `User ${userName} is defined more than once`,
      })
    );
  const groupNames = groups.map(({ groupName }) => groupName);
  groupNames
    .filter((groupName, index) => groupNames.indexOf(groupName) !== index)
    .forEach((groupName) =>
      issues.push({
        errorCode: "duplicate_group",
        message: `Group ${groupName} is defined more than once`,
      })
    );
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return { users, groups };
}

/** Every passthrough parameter becomes a stack output, so output ids must not collide */
export function collectPassthroughIssues(
  parameterNames: ReadonlyArray<string>
): ConfigurationIssue[] {
  const issues: ConfigurationIssue[] = [];
  const namesById = new Map<string, string>();

  parameterNames.forEach((parameterName) => {
    const id = outputId(parameterName);
    const existing = namesById.get(id);
    if (existing === undefined) {
      namesById.set(id, parameterName);
    } else if (existing === parameterName) {
      issues.push({
        errorCode: "duplicate_passthrough_parameter",
        message: `Passthrough parameter ${parameterName} is listed more than once`,
      });
    } else {
      issues.push({
        errorCode: "conflicting_passthrough_parameter",
        message: `Passthrough parameters ${existing} and ${parameterName} both map to output ${id}`,
      });
    }
  });

  return issues;
}

/**
 * Loads the build configuration from a YAML file. The manual provisioning
 * file, when used, is resolved relative to the configuration file
 */
export function loadBuildConfig(configFilePath: string): BuildConfig {
  const unparsedEnv = ensureObject(readYaml(configFilePath), configFilePath);
  const deploymentSettings = ensureObject(
    unparsedEnv["DeploymentSettings"],
    "DeploymentSettings"
  );
  const parameters = ensureObject(unparsedEnv["Parameters"], "Parameters");

  const permissionSets = imperativeParseJSON(
    unparsedEnv["PermissionSets"],
    permissionSetsValidate
  );
  const globalGroupRules = imperativeParseJSON(
    unparsedEnv["GlobalGroupRules"],
    globalGroupRulesValidate
  );
  validatePermissionSets(permissionSets);
  const ruleIssues = collectRuleIssues(globalGroupRules, permissionSets);
  if (ruleIssues.length > 0) {
    throw new ConfigurationError(ruleIssues);
  }
  const passthroughParameterNames = ensureStringList(
    parameters,
    "PassthroughParameterNames"
  );
  const passthroughIssues = collectPassthroughIssues(passthroughParameterNames);
  if (passthroughIssues.length > 0) {
    throw new ConfigurationError(passthroughIssues);
  }

  const isAutomaticProvisioningEnabled = ensureBoolean(
    parameters,
    "IsAutomaticProvisioningEnabled"
  );
  const manualProvisioningFile = isAutomaticProvisioningEnabled
    ? ensureOptionalString(parameters, "ManualProvisioningFile")
    : ensureString(parameters, "ManualProvisioningFile");
  const functionLogMode = ensureValidString(parameters, "FunctionLogMode", [
    "INFO",
    "WARN",
    "DEBUG",
    "EXCEPTION",
  ]);

  return {
    App: ensureString(unparsedEnv, "App"),
    Environment: ensureString(unparsedEnv, "Environment"),
    Version: ensureString(unparsedEnv, "Version"),

    DeploymentSettings: {
      BootstrapQualifier: ensureString(deploymentSettings, "BootstrapQualifier"),
      AccountId: ensureString(deploymentSettings, "AccountId"),
      Region: ensureString(deploymentSettings, "Region"),
    },

    Parameters: {
      AccountInventoryParamName: ensureString(
        parameters,
        "AccountInventoryParamName"
      ),
      AccountInventoryParamRegion: ensureString(
        parameters,
        "AccountInventoryParamRegion"
      ),
      AccountInventoryReaderRoleArn: ensureOptionalString(
        parameters,
        "AccountInventoryReaderRoleArn"
      ),
      AssignmentsParamName: ensureString(parameters, "AssignmentsParamName"),
      IsAutomaticProvisioningEnabled: isAutomaticProvisioningEnabled,
      ManualProvisioningFile: manualProvisioningFile,
      PassthroughParameterNames: passthroughParameterNames,
      FunctionLogMode: functionLogMode,
    },

    PermissionSets: permissionSets,
    GlobalGroupRules: globalGroupRules,
    ...(!isAutomaticProvisioningEnabled && {
      ManualProvisioning: loadManualProvisioning(
        resolve(dirname(configFilePath), manualProvisioningFile)
      ),
    }),
  };
}
