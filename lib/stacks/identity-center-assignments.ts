/**
 * Deploys the account assignment resolution for one environment. Permission
 * sets and manual identities are published for the provisioning module, the
 * account assignments are resolved at deployment time by the
 * AssignmentResolver construct
 */
import { Aws, CfnOutput, Stack, StackProps } from "aws-cdk-lib";
import { ParameterTier, StringParameter } from "aws-cdk-lib/aws-ssm";
import { Construct } from "constructs";
import { BuildConfig } from "../build/buildConfig";
import { AssignmentResolver } from "../constructs/assignment-resolver";
import { name, outputId } from "../constructs/helpers";
import { renderPermissionSet } from "../lambda-functions/helpers/src/permissionSets";

export class IdentityCenterAssignments extends Stack {
  public readonly deployAssignmentResolver: AssignmentResolver;
  public readonly permissionSetsParameter: StringParameter;
  public readonly manualProvisioningParameter?: StringParameter;

  constructor(
    scope: Construct,
    id: string,
    props: StackProps | undefined,
    buildConfig: BuildConfig
  ) {
    super(scope, id, props);

    this.permissionSetsParameter = new StringParameter(
      this,
      name(buildConfig, "permissionSets"),
      {
        parameterName: name(buildConfig, "permissionSets"),
        tier: ParameterTier.INTELLIGENT_TIERING,
        stringValue: JSON.stringify(
          buildConfig.PermissionSets.map(renderPermissionSet)
        ),
      }
    );

    if (buildConfig.ManualProvisioning) {
      this.manualProvisioningParameter = new StringParameter(
        this,
        name(buildConfig, "manualProvisioningIdentities"),
        {
          parameterName: name(buildConfig, "manualProvisioningIdentities"),
          tier: ParameterTier.INTELLIGENT_TIERING,
          stringValue: JSON.stringify(buildConfig.ManualProvisioning),
        }
      );
    }

    this.deployAssignmentResolver = new AssignmentResolver(
      this,
      name(buildConfig, "assignmentResolver"),
      buildConfig
    );

    new CfnOutput(this, "CurrentAccountId", {
      value: Aws.ACCOUNT_ID,
    });
    new CfnOutput(this, "CurrentRegion", {
      value: Aws.REGION,
    });
    new CfnOutput(this, "AssignmentCount", {
      value: this.deployAssignmentResolver.assignmentCount,
    });

    buildConfig.Parameters.PassthroughParameterNames.forEach(
      (parameterName) => {
        new CfnOutput(this, outputId(parameterName), {
          description: parameterName,
          value: StringParameter.valueForStringParameter(this, parameterName),
        });
      }
    );
  }
}
