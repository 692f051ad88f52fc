/**
 * Objective: Implement custom resource that resolves account assignments for
 * the downstream provisioning module Trigger source: Cloudformation custom
 * resource provider framework
 *
 * - Read the account inventory from the shared parameter store, assuming the
 *   inventory reader role when one is configured
 * - Validate permission sets, global group rules and provisioned principals
 *   passed as resource properties
 * - Resolve the assignments and persist them as a JSON parameter
 * - If the request type is delete, remove the assignments parameter
 */

const { functionLogMode, AWS_REGION, AWS_LAMBDA_FUNCTION_NAME } = process.env;

// Lambda types import
// SDK and third party client imports
import {
  DeleteParameterCommand,
  ParameterNotFound,
  PutParameterCommand,
  SSMClient,
  SSMServiceException,
} from "@aws-sdk/client-ssm";
import { fromTemporaryCredentials } from "@aws-sdk/credential-providers";
import { CloudFormationCustomResourceEvent } from "aws-lambda";
import { v4 as uuidv4 } from "uuid";
import { readAccountInventory } from "../../helpers/src/accountInventory";
import {
  isActiveAccount,
  resolveAssignments,
} from "../../helpers/src/assignmentResolver";
import {
  logModes,
  requestStatus,
  ResolverResourceProperties,
} from "../../helpers/src/interfaces";
import {
  ConfigurationError,
  imperativeParseJSON,
  JSONParserError,
} from "../../helpers/src/payload-validator";
import {
  globalGroupRulesValidate,
  permissionSetsValidate,
  principalNamesValidate,
} from "../../helpers/src/schemaValidators";
import {
  constructExceptionMessageforLogger,
  logger,
} from "../../helpers/src/utilities";

const handlerName = AWS_LAMBDA_FUNCTION_NAME + "";
const ssmClientObject = new SSMClient({ region: AWS_REGION, maxAttempts: 2 });

export interface ResolverResponse {
  readonly PhysicalResourceId: string;
  readonly Data?: {
    readonly AssignmentCount: number;
    readonly ExcludedAccountCount: number;
  };
}

/** Empty string means the principal names are not known (automatic provisioning) */
const knownPrincipals = (value: string): ReadonlySet<string> | undefined =>
  value.length > 0
    ? new Set(imperativeParseJSON(value, principalNamesValidate))
    : undefined;

const inventoryClient = (properties: ResolverResourceProperties): SSMClient => {
  if (properties.accountInventoryReaderRoleArn.length > 0) {
    return new SSMClient({
      region: properties.accountInventoryParamRegion,
      credentials: fromTemporaryCredentials({
        params: {
          RoleArn: properties.accountInventoryReaderRoleArn,
        },
      }),
      maxAttempts: 2,
    });
  }
  return properties.accountInventoryParamRegion === AWS_REGION
    ? ssmClientObject
    : new SSMClient({
        region: properties.accountInventoryParamRegion,
        maxAttempts: 2,
      });
};

async function resolveAndPersist(
  properties: ResolverResourceProperties,
  requestId: string
): Promise<ResolverResponse> {
  const accounts = await readAccountInventory(
    inventoryClient(properties),
    properties.accountInventoryParamName
  );
  logger(
    {
      handler: handlerName,
      logMode: logModes.Debug,
      requestId: requestId,
      status: requestStatus.InProgress,
      relatedData: properties.accountInventoryParamName,
      statusMessage: `Read ${accounts.length} accounts from the account inventory`,
    },
    functionLogMode
  );

  const assignments = resolveAssignments(
    accounts,
    imperativeParseJSON(properties.permissionSets, permissionSetsValidate),
    imperativeParseJSON(properties.globalGroupRules, globalGroupRulesValidate),
    isActiveAccount,
    {
      knownGroups: knownPrincipals(properties.knownGroups),
      knownUsers: knownPrincipals(properties.knownUsers),
    }
  );
  logger(
    {
      handler: handlerName,
      logMode: logModes.Debug,
      requestId: requestId,
      status: requestStatus.InProgress,
      statusMessage: `Resolved assignments for ${assignments.length} active accounts`,
    },
    functionLogMode
  );

  await ssmClientObject.send(
    new PutParameterCommand({
      Name: properties.assignmentsParamName,
      Value: JSON.stringify(assignments),
      Type: "String",
      Tier: "Intelligent-Tiering",
      Overwrite: true,
    })
  );
  logger(
    {
      handler: handlerName,
      logMode: logModes.Info,
      requestId: requestId,
      status: requestStatus.Completed,
      relatedData: properties.assignmentsParamName,
      statusMessage: `Persisted account assignments`,
    },
    functionLogMode
  );

  return {
    PhysicalResourceId: properties.assignmentsParamName,
    Data: {
      AssignmentCount: assignments.length,
      ExcludedAccountCount: accounts.length - assignments.length,
    },
  };
}

async function removeAssignments(
  assignmentsParamName: string,
  requestId: string
): Promise<ResolverResponse> {
  try {
    await ssmClientObject.send(
      new DeleteParameterCommand({
        Name: assignmentsParamName,
      })
    );
    logger(
      {
        handler: handlerName,
        logMode: logModes.Info,
        requestId: requestId,
        status: requestStatus.Completed,
        relatedData: assignmentsParamName,
        statusMessage: `Removed account assignments parameter`,
      },
      functionLogMode
    );
  } catch (err) {
    if (!(err instanceof ParameterNotFound)) {
      throw err;
    }
    logger(
      {
        handler: handlerName,
        logMode: logModes.Warn,
        requestId: requestId,
        status: requestStatus.Completed,
        relatedData: assignmentsParamName,
        statusMessage: `Account assignments parameter was already removed`,
      },
      functionLogMode
    );
  }
  return { PhysicalResourceId: assignmentsParamName };
}

export const handler = async (
  event: CloudFormationCustomResourceEvent
): Promise<ResolverResponse> => {
  const requestId = uuidv4().toString();
  const properties: ResolverResourceProperties = {
    accountInventoryParamName: `${event.ResourceProperties.accountInventoryParamName}`,
    accountInventoryParamRegion: `${event.ResourceProperties.accountInventoryParamRegion ?? AWS_REGION}`,
    accountInventoryReaderRoleArn: `${event.ResourceProperties.accountInventoryReaderRoleArn ?? ""}`,
    assignmentsParamName: `${event.ResourceProperties.assignmentsParamName}`,
    permissionSets: `${event.ResourceProperties.permissionSets}`,
    globalGroupRules: `${event.ResourceProperties.globalGroupRules}`,
    knownGroups: `${event.ResourceProperties.knownGroups ?? ""}`,
    knownUsers: `${event.ResourceProperties.knownUsers ?? ""}`,
  };
  logger(
    {
      handler: handlerName,
      logMode: logModes.Info,
      requestId: requestId,
      status: requestStatus.InProgress,
      relatedData: properties.assignmentsParamName,
      statusMessage: `Account assignment resolution ${event.RequestType} operation started`,
    },
    functionLogMode
  );

  try {
    if (event.RequestType === "Delete") {
      return await removeAssignments(properties.assignmentsParamName, requestId);
    }
    return await resolveAndPersist(properties, requestId);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      logger({
        handler: handlerName,
        requestId: requestId,
        logMode: logModes.Exception,
        status: requestStatus.FailedWithError,
        statusMessage: constructExceptionMessageforLogger(
          requestId,
          "Configuration exception",
          err.message,
          JSON.stringify(err.issues)
        ),
      });
    } else if (err instanceof JSONParserError) {
      logger({
        handler: handlerName,
        requestId: requestId,
        logMode: logModes.Exception,
        status: requestStatus.FailedWithError,
        statusMessage: constructExceptionMessageforLogger(
          requestId,
          "Schema validation exception",
          "Resource properties or account inventory do not pass the schema validation",
          JSON.stringify(err.errors)
        ),
      });
    } else if (err instanceof SSMServiceException) {
      logger({
        handler: handlerName,
        requestId: requestId,
        logMode: logModes.Exception,
        status: requestStatus.FailedWithException,
        statusMessage: constructExceptionMessageforLogger(
          requestId,
          err.name,
          err.message,
          properties.accountInventoryParamName
        ),
      });
    } else {
      logger({
        handler: handlerName,
        requestId: requestId,
        logMode: logModes.Exception,
        status: requestStatus.FailedWithException,
        statusMessage: constructExceptionMessageforLogger(
          requestId,
          "Unhandled exception",
          JSON.stringify(err),
          ""
        ),
      });
    }
    throw err;
  }
};
