/**
 * Custom resource construct that resolves account assignments at deployment
 * time. The account inventory is only known at deployment time, so the
 * resolution runs in a lambda function behind the custom resource provider
 * framework and stores its result in the parameter store
 */

import { CustomResource, Duration, Stack } from "aws-cdk-lib";
import { PolicyStatement } from "aws-cdk-lib/aws-iam";
import { Architecture, Runtime } from "aws-cdk-lib/aws-lambda";
import { NodejsFunction } from "aws-cdk-lib/aws-lambda-nodejs";
import { Provider } from "aws-cdk-lib/custom-resources";
import { Construct } from "constructs";
import { join } from "path";
import { v4 as uuidv4 } from "uuid";
import { BuildConfig } from "../build/buildConfig";
import { toFunctionLogMode } from "../build/configLoader";
import { ResolverResourceProperties } from "../lambda-functions/helpers/src/interfaces";
import { name, parameterArn } from "./helpers";

const generateRandomString = uuidv4().toString().split("-")[0];

export class AssignmentResolver extends Construct {
  public readonly resolverHandler: NodejsFunction;
  public readonly resolverResource: CustomResource;
  public readonly assignmentCount: string;

  constructor(scope: Construct, id: string, buildConfig: BuildConfig) {
    super(scope, id);
    const { Parameters, ManualProvisioning } = buildConfig;

    this.resolverHandler = new NodejsFunction(
      this,
      name(buildConfig, "resolveAssignments"),
      {
        runtime: Runtime.NODEJS_20_X,
        architecture: Architecture.ARM_64,
        functionName: name(buildConfig, "resolveAssignmentsHandler"),
        entry: join(
          __dirname,
          "../../",
          "lib",
          "lambda-functions",
          "assignment-handlers",
          "src",
          "resolveAssignments.ts"
        ),
        timeout: Duration.minutes(1),
        environment: {
          functionLogMode: toFunctionLogMode(Parameters.FunctionLogMode),
        },
        bundling: {
          minify: true,
        },
      }
    );

    const stack = Stack.of(this);
    if (Parameters.AccountInventoryReaderRoleArn.length > 0) {
      this.resolverHandler.addToRolePolicy(
        new PolicyStatement({
          resources: [Parameters.AccountInventoryReaderRoleArn],
          actions: ["sts:AssumeRole"],
        })
      );
    } else {
      this.resolverHandler.addToRolePolicy(
        new PolicyStatement({
          resources: [
            parameterArn(
              stack.partition,
              Parameters.AccountInventoryParamRegion,
              stack.account,
              Parameters.AccountInventoryParamName
            ),
          ],
          actions: ["ssm:GetParameter"],
        })
      );
    }
    this.resolverHandler.addToRolePolicy(
      new PolicyStatement({
        resources: [
          parameterArn(
            stack.partition,
            stack.region,
            stack.account,
            Parameters.AssignmentsParamName
          ),
        ],
        actions: ["ssm:PutParameter", "ssm:DeleteParameter"],
      })
    );

    const resolverProvider = new Provider(
      this,
      name(buildConfig, "resolverProvider"),
      {
        onEventHandler: this.resolverHandler,
      }
    );

    const properties: ResolverResourceProperties = {
      accountInventoryParamName: Parameters.AccountInventoryParamName,
      accountInventoryParamRegion: Parameters.AccountInventoryParamRegion,
      accountInventoryReaderRoleArn: Parameters.AccountInventoryReaderRoleArn,
      assignmentsParamName: Parameters.AssignmentsParamName,
      permissionSets: JSON.stringify(buildConfig.PermissionSets),
      globalGroupRules: JSON.stringify(buildConfig.GlobalGroupRules),
      knownGroups: ManualProvisioning
        ? JSON.stringify(ManualProvisioning.groups.map((g) => g.groupName))
        : "",
      knownUsers: ManualProvisioning
        ? JSON.stringify(ManualProvisioning.users.map((u) => u.userName))
        : "",
    };

    this.resolverResource = new CustomResource(
      this,
      name(buildConfig, "resolverResource"),
      {
        serviceToken: resolverProvider.serviceToken,
        resourceType: "Custom::AssignmentResolver",
        properties: {
          ...properties,
          // changes on every synthesis so each deployment reads the inventory again
          resolutionNonce: generateRandomString,
        },
      }
    );

    this.assignmentCount = this.resolverResource.getAttString("AssignmentCount");
  }
}
