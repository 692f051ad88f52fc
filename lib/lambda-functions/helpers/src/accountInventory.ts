/**
 * Account inventory access. The inventory is owned by the account factory and
 * published as one JSON parameter in the shared parameter store; this module
 * only reads it
 */

import { GetParameterCommand, SSMClient } from "@aws-sdk/client-ssm";
import { AccountRecord } from "./interfaces";
import { ConfigurationError, imperativeParseJSON } from "./payload-validator";
import { accountInventoryValidate } from "./schemaValidators";

export const parseAccountInventory = (
  data: unknown
): AccountRecord[] => imperativeParseJSON(data, accountInventoryValidate);

export const readAccountInventory = async (
  ssmClientObject: SSMClient,
  paramName: string
): Promise<AccountRecord[]> => {
  const parameter = await ssmClientObject.send(
    new GetParameterCommand({
      Name: paramName,
    })
  );
  const value = parameter.Parameter?.Value;
  if (!value) {
    throw new ConfigurationError([
      {
        errorCode: "missing_account_inventory",
        message: `Account inventory parameter ${paramName} has no value`,
      },
    ]);
  }

  return parseAccountInventory(value);
};
