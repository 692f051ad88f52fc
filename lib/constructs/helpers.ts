/** All helper utilities used by different constructs */

import { BuildConfig } from "../build/buildConfig";

/**
 * Environment specific resource naming function
 *
 * @param buildConfig
 * @param resourcename
 * @returns Environment specific resource name
 */
export function name(buildConfig: BuildConfig, resourcename: string): string {
  return buildConfig.Environment + "-" + resourcename;
}

/** Parameter names with a leading slash are hierarchical and keep it in the ARN path */
export function parameterArn(
  partition: string,
  region: string,
  account: string,
  parameterName: string
): string {
  const path = parameterName.startsWith("/")
    ? parameterName.slice(1)
    : parameterName;
  return `arn:${partition}:ssm:${region}:${account}:parameter/${path}`;
}

/** Output ids only take alphanumeric characters */
export const outputId = (parameterName: string) =>
  "Parameter" +
  parameterName
    .split(/[^A-Za-z0-9]+/)
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.charAt(0).toUpperCase() + segment.slice(1))
    .join("");
