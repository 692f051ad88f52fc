#!/usr/bin/env node

import { App, DefaultStackSynthesizer, Tags } from "aws-cdk-lib";
import { resolve } from "path";
import { loadBuildConfig } from "../lib/build/configLoader";
import { IdentityCenterAssignments } from "../lib/stacks/identity-center-assignments";

const app = new App();

function getConfig() {
  const env = app.node.tryGetContext("config");
  if (!env)
    throw new Error(
      "Context variable missing on CDK command. Pass in as `-c config=XXX`"
    );

  return loadBuildConfig(resolve("./config/" + env + ".yaml"));
}

const buildConfig = getConfig();

const identityCenterAssignmentsStack = new IdentityCenterAssignments(
  app,
  buildConfig.Environment + "-" + buildConfig.App,
  {
    env: {
      account: buildConfig.DeploymentSettings.AccountId,
      region: buildConfig.DeploymentSettings.Region,
    },
    synthesizer: new DefaultStackSynthesizer({
      qualifier: buildConfig.DeploymentSettings.BootstrapQualifier,
    }),
  },
  buildConfig
);

Tags.of(identityCenterAssignmentsStack).add("App", buildConfig.App);
Tags.of(identityCenterAssignmentsStack).add(
  "Environment",
  buildConfig.Environment
);
