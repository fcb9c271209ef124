import chalk from 'chalk';

import { composableCodePath } from './code';
import type { Context } from './context';
import { NothingToDeployError } from './error';
import { executeDeploy } from './extrinsic';
import { loadManifest, requireComposableSchedule } from './manifest';
import { deriveAccountId } from './signer';
import type { ExtrinsicOpts } from './type';

/**
 * Deploys every component of the composable schedule to its node, one after
 * another in schedule order. Stops at the first failing component; components
 * deployed before it stay deployed.
 */
export const executeComposableDeploy = async (context: Context, suri: string): Promise<string> => {
  const manifest = await loadManifest(context.manifestPath);
  const targets = requireComposableSchedule(manifest).deploy ?? [];
  if (targets.length === 0) {
    throw new NothingToDeployError();
  }

  const account = deriveAccountId(suri, 'signer');

  console.log(chalk.blueBright.bold('Deploy composable components to appointed urls'));
  for (const [index, target] of targets.entries()) {
    console.log(`Deploying: ${target.compose} (${target.url}) [${index + 1}/${targets.length}]`);

    const opts: ExtrinsicOpts = {
      url: target.url,
      suri,
      password: undefined,
    };
    const codeHash = await executeDeploy(context, opts, composableCodePath(context.targetDirectory, target.compose));

    console.log(
      `${chalk.blueBright.bold(target.compose)} - ` +
        `${chalk.blueBright('successfully deployed byte code with hash:')} ${codeHash}`,
    );
  }

  return `All components successfully deployed for ${account}`;
};
