import { App, DefaultStackSynthesizer } from "aws-cdk-lib";
import { Match, Template } from "aws-cdk-lib/assertions";
import { join } from "path";
import { BuildConfig } from "../lib/build/buildConfig";
import { loadBuildConfig } from "../lib/build/configLoader";
import { outputId } from "../lib/constructs/helpers";
import { IdentityCenterAssignments } from "../lib/stacks/identity-center-assignments";

function synthesize(buildConfig: BuildConfig): Template {
  /** Lambda bundling is skipped, only the template is checked */
  const app = new App({ context: { "aws:cdk:bundling-stacks": [] } });
  const stack = new IdentityCenterAssignments(
    app,
    "MyTestStack",
    {
      env: {
        region: buildConfig.DeploymentSettings.Region,
        account: buildConfig.DeploymentSettings.AccountId,
      },
      synthesizer: new DefaultStackSynthesizer({
        qualifier: buildConfig.DeploymentSettings.BootstrapQualifier,
      }),
    },
    buildConfig
  );
  return Template.fromStack(stack);
}

describe("Identity center assignments stack", () => {
  const buildConfig = loadBuildConfig(
    join(__dirname, "..", "config", "example.yaml")
  );
  const template = synthesize(buildConfig);

  it("Publishes the rendered permission sets", () => {
    template.hasResourceProperties("AWS::SSM::Parameter", {
      Name: "env-permissionSets",
      Tier: "Intelligent-Tiering",
      Value: Match.serializedJson(
        Match.arrayWith([
          Match.objectLike({
            permissionSetName: "Billing",
            sessionDuration: "PT8H",
            managedPoliciesArnList: [
              "arn:aws:iam::aws:policy/job-function/Billing",
            ],
          }),
        ])
      ),
    });
  });

  it("Publishes the manual identities", () => {
    template.hasResourceProperties("AWS::SSM::Parameter", {
      Name: "env-manualProvisioningIdentities",
    });
  });

  it("Passes the configuration to the resolver custom resource", () => {
    template.hasResourceProperties("Custom::AssignmentResolver", {
      accountInventoryParamName: "/org/account-factory/account-map",
      accountInventoryReaderRoleArn:
        "arn:aws:iam::222222222222:role/account-map-reader",
      assignmentsParamName: "/identity-center/account-assignments",
      globalGroupRules: JSON.stringify(buildConfig.GlobalGroupRules),
      knownGroups: '["platform-admins","finance","support-engineers"]',
      knownUsers: '["jane.doe@example.com","john.roe@example.com"]',
    });
  });

  it("Deploys the resolver function with the configured log mode", () => {
    template.hasResourceProperties("AWS::Lambda::Function", {
      FunctionName: "env-resolveAssignmentsHandler",
      Runtime: "nodejs20.x",
      Environment: {
        Variables: Match.objectLike({ functionLogMode: "Info" }),
      },
    });
  });

  it("Allows the resolver to assume the inventory reader role", () => {
    template.hasResourceProperties("AWS::IAM::Policy", {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: "sts:AssumeRole",
            Resource: "arn:aws:iam::222222222222:role/account-map-reader",
          }),
        ]),
      },
    });
  });

  it("Exposes the current account, region and passthrough parameters", () => {
    template.hasOutput("CurrentAccountId", {
      Value: { Ref: "AWS::AccountId" },
    });
    template.hasOutput("CurrentRegion", { Value: { Ref: "AWS::Region" } });
    template.hasOutput(
      "ParameterOrgCoreParametersSecurityAccountId",
      Match.objectLike({
        Description: "/org/core-parameters/security-account-id",
      })
    );
    template.hasOutput("ParameterOrgCoreParametersLogArchiveBucket", {});
  });
});

describe("Identity center assignments stack with automatic provisioning", () => {
  const template = synthesize(
    loadBuildConfig(join(__dirname, "data", "automatic-provisioning.yaml"))
  );

  it("Does not publish manual identities", () => {
    template.resourcePropertiesCountIs(
      "AWS::SSM::Parameter",
      { Name: "auto-manualProvisioningIdentities" },
      0
    );
  });

  it("Does not restrict the resolved principals", () => {
    template.hasResourceProperties("Custom::AssignmentResolver", {
      knownGroups: "",
      knownUsers: "",
      accountInventoryReaderRoleArn: "",
    });
  });

  it("Reads the inventory parameter of the deployment account", () => {
    template.hasResourceProperties("AWS::IAM::Policy", {
      PolicyDocument: {
        Statement: Match.arrayWith([
          Match.objectLike({
            Action: "ssm:GetParameter",
            Resource: {
              "Fn::Join": [
                "",
                [
                  "arn:",
                  { Ref: "AWS::Partition" },
                  ":ssm:eu-central-1:111111111111:parameter/account-map",
                ],
              ],
            },
          }),
        ]),
      },
    });
  });
});

describe("Output ids", () => {
  it("Builds alphanumeric output ids from parameter names", () => {
    expect(outputId("/org/core-parameters/security-account-id")).toBe(
      "ParameterOrgCoreParametersSecurityAccountId"
    );
  });
});
