import {
  GlobalGroupRule,
  ManualProvisioningIdentities,
  PermissionSetDefinition,
} from "../lambda-functions/helpers/src/interfaces";

/**
 * Build parameters inteface Used for validating configuration files at
 * synthesis time for correctness of data type and data ranges/values
 */
export interface BuildConfig {
  readonly App: string /** Used as prefix for stack names */;
  readonly Environment: string /** Used as prefix for resource and parameter names */;
  readonly Version: string;
  readonly DeploymentSettings: DeploymentSettings;
  readonly Parameters: Parameters;
  readonly PermissionSets: ReadonlyArray<PermissionSetDefinition>;
  /** Ordered; the order is kept in every resolved account assignment */
  readonly GlobalGroupRules: ReadonlyArray<GlobalGroupRule>;
  /**
   * Users and groups managed by this repository - only loaded when
   * IsAutomaticProvisioningEnabled is false
   */
  readonly ManualProvisioning?: ManualProvisioningIdentities;
}

export interface DeploymentSettings {
  readonly BootstrapQualifier: string /** CDK bootstrap qualifier to deploy the solution */;
  readonly AccountId: string;
  readonly Region: string;
}

/** Solution specific parameters */
export interface Parameters {
  readonly AccountInventoryParamName: string /** Shared parameter holding the account inventory JSON */;
  readonly AccountInventoryParamRegion: string;
  /**
   * IAM role arn in the account owning the inventory parameter, assumed by the
   * resolver to read it. Empty when the parameter lives in the deployment account
   */
  readonly AccountInventoryReaderRoleArn: string;
  readonly AssignmentsParamName: string /** Parameter the resolved account assignments are written to */;
  /**
   * Used as switch to determine whether users and groups are synchronised from
   * an external identity provider (SCIM) or listed in ManualProvisioningFile
   */
  readonly IsAutomaticProvisioningEnabled: boolean;
  readonly ManualProvisioningFile: string;
  /** Parameter names read from the parameter store and exposed unmodified as stack outputs */
  readonly PassthroughParameterNames: ReadonlyArray<string>;
  /**
   * Used as switch to set the level of lambda function logging the solution
   * should use - one of ["INFO","WARN","DEBUG","EXCEPTION"]
   */
  readonly FunctionLogMode: string;
}
