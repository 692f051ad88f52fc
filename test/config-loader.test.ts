import { join } from "path";
import {
  collectPassthroughIssues,
  ensureStringList,
  ensureValidString,
  loadBuildConfig,
  loadManualProvisioning,
  toFunctionLogMode,
} from "../lib/build/configLoader";
import { logModes } from "../lib/lambda-functions/helpers/src/interfaces";
import { ConfigurationError } from "../lib/lambda-functions/helpers/src/payload-validator";

const configPath = (fileName: string) => join(__dirname, "..", "config", fileName);
const dataPath = (fileName: string) => join(__dirname, "data", fileName);

describe("Build configuration", () => {
  it("Loads the example configuration with its manual identities", () => {
    const buildConfig = loadBuildConfig(configPath("example.yaml"));

    expect(buildConfig.Environment).toBe("env");
    expect(buildConfig.DeploymentSettings).toEqual({
      BootstrapQualifier: "idcassign",
      AccountId: "111111111111",
      Region: "eu-central-1",
    });
    expect(buildConfig.Parameters.PassthroughParameterNames).toEqual([
      "/org/core-parameters/security-account-id",
      "/org/core-parameters/log-archive-bucket",
    ]);
    expect(buildConfig.PermissionSets.map(({ name }) => name)).toEqual([
      "AdministratorAccess",
      "Billing",
      "SupportUser",
    ]);
    expect(buildConfig.GlobalGroupRules.map(({ role }) => role)).toEqual([
      "admin",
      "billing",
      "support",
    ]);
    expect(buildConfig.ManualProvisioning).toEqual({
      users: [
        {
          userName: "jane.doe@example.com",
          givenName: "Jane",
          familyName: "Doe",
          email: "jane.doe@example.com",
        },
        {
          userName: "john.roe@example.com",
          givenName: "John",
          familyName: "Roe",
        },
      ],
      groups: [
        {
          groupName: "platform-admins",
          description: "Platform team",
          members: ["jane.doe@example.com"],
        },
        { groupName: "finance", members: ["john.roe@example.com"] },
        {
          groupName: "support-engineers",
          members: ["jane.doe@example.com", "john.roe@example.com"],
        },
      ],
    });
  });

  it("Skips the manual identities when automatic provisioning is enabled", () => {
    const buildConfig = loadBuildConfig(dataPath("automatic-provisioning.yaml"));

    expect(buildConfig.ManualProvisioning).toBeUndefined();
    expect(buildConfig.Parameters.ManualProvisioningFile).toBe("");
    expect(buildConfig.Parameters.AccountInventoryReaderRoleArn).toBe("");
    expect(buildConfig.Parameters.PassthroughParameterNames).toEqual([]);
  });

  it("Rejects rules that reference undefined permission sets", () => {
    expect(() =>
      loadBuildConfig(dataPath("unknown-permission-set.yaml"))
    ).toThrow(
      new ConfigurationError([
        {
          errorCode: "unknown_permission_set",
          message:
            "Role support references permission set SupportUser which is not defined",
        },
      ])
    );
  });

  it("Rejects two roles that assign the same permission set", () => {
    expect(() =>
      loadBuildConfig(dataPath("shared-permission-set.yaml"))
    ).toThrow(
      new ConfigurationError([
        {
          errorCode: "duplicate_permission_set_reference",
          message:
            "Role ops references permission set AdministratorAccess which another role already assigns",
        },
      ])
    );
  });

  it("Rejects permission sets that are defined twice", () => {
    expect(() =>
      loadBuildConfig(dataPath("duplicate-permission-set.yaml"))
    ).toThrow("Permission set AdministratorAccess is defined more than once");
  });

  it("Rejects passthrough parameters that map to the same output", () => {
    expect(() =>
      loadBuildConfig(dataPath("conflicting-passthrough.yaml"))
    ).toThrow(
      "Passthrough parameters /org/a-b and /org/a/b both map to output ParameterOrgAB"
    );
  });

  it("Rejects an empty mandatory parameter", () => {
    expect(() =>
      loadBuildConfig(dataPath("missing-inventory-parameter.yaml"))
    ).toThrow("AccountInventoryParamName does not exist or is empty");
  });

  it("Requires the manual identities file when automatic provisioning is disabled", () => {
    expect(() => loadBuildConfig(dataPath("manual-without-file.yaml"))).toThrow(
      "ManualProvisioningFile does not exist or is empty"
    );
  });

  it("Rejects group members that are not defined users", () => {
    try {
      loadManualProvisioning(dataPath("unknown-member-identities.yaml"));
      throw new Error("Expected a ConfigurationError");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.issues).toEqual([
          {
            errorCode: "unknown_group_member",
            message:
              "Group platform-admins lists member max.mustermann@example.com which is not a defined user",
          },
          {
            errorCode: "duplicate_group",
            message: "Group platform-admins is defined more than once",
          },
        ]);
      }
    }
  });

  it("Rejects users that are defined more than once", () => {
    expect(() =>
      loadManualProvisioning(dataPath("duplicate-user-identities.yaml"))
    ).toThrow(
      new ConfigurationError([
        {
          errorCode: "duplicate_user",
          message: "User jane.doe@example.com is defined more than once",
        },
      ])
    );
  });
});

describe("Passthrough parameters", () => {
  it("Accepts names with distinct output ids", () => {
    expect(
      collectPassthroughIssues([
        "/org/core-parameters/security-account-id",
        "/org/core-parameters/log-archive-bucket",
      ])
    ).toEqual([]);
  });

  it("Reports repeated and colliding names", () => {
    expect(collectPassthroughIssues(["/org/x", "/org/x", "org-x"])).toEqual([
      {
        errorCode: "duplicate_passthrough_parameter",
        message: "Passthrough parameter /org/x is listed more than once",
      },
      {
        errorCode: "conflicting_passthrough_parameter",
        message:
          "Passthrough parameters /org/x and org-x both map to output ParameterOrgX",
      },
    ]);
  });
});

describe("Configuration helpers", () => {
  it("Validates enumerated strings case insensitively", () => {
    expect(
      ensureValidString({ FunctionLogMode: "warn" }, "FunctionLogMode", [
        "INFO",
        "WARN",
      ])
    ).toBe("warn");
    expect(() =>
      ensureValidString({ FunctionLogMode: "TRACE" }, "FunctionLogMode", [
        "INFO",
        "WARN",
      ])
    ).toThrow("FunctionLogMode is not one of the valid values - INFO,WARN");
  });

  it("Rejects lists with empty entries", () => {
    expect(ensureStringList({}, "PassthroughParameterNames")).toEqual([]);
    expect(() =>
      ensureStringList({ PassthroughParameterNames: ["a", ""] }, "PassthroughParameterNames")
    ).toThrow("PassthroughParameterNames is not a list of non empty strings");
  });

  it("Maps function log modes to logger levels", () => {
    expect(toFunctionLogMode("EXCEPTION")).toBe(logModes.Exception);
    expect(toFunctionLogMode("info")).toBe(logModes.Info);
    expect(() => toFunctionLogMode("TRACE")).toThrow(
      "FunctionLogMode is not one of the valid values - INFO,WARN,DEBUG,EXCEPTION"
    );
  });
});
