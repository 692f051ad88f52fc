import Ajv from "ajv";
import accountInventorySchema from "../schema-definitions/account-inventory.json";
import globalGroupRulesSchema from "../schema-definitions/global-group-rules.json";
import permissionSetsSchema from "../schema-definitions/permission-sets.json";
import principalNamesSchema from "../schema-definitions/principal-names.json";
import {
  AccountRecord,
  GlobalGroupRule,
  PermissionSetDefinition,
} from "./interfaces";

const ajv = new Ajv({ allErrors: true });

export const accountInventoryValidate =
  ajv.compile<AccountRecord[]>(accountInventorySchema);
export const permissionSetsValidate =
  ajv.compile<PermissionSetDefinition[]>(permissionSetsSchema);
export const globalGroupRulesValidate =
  ajv.compile<GlobalGroupRule[]>(globalGroupRulesSchema);
export const principalNamesValidate =
  ajv.compile<string[]>(principalNamesSchema);
