import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { parseConstraint, isSatisfiedBy } from '../core/dependency-resolver/version-constraint.js';
import { resolveOutput, type OutputPort } from '../core/ports/index.js';

/**
 * Returns whether `version` satisfies `constraint`; an invalid constraint throws.
 */
export function checkCommand(constraint: string, version: string, output?: OutputPort): boolean {
  const out = output ?? resolveOutput();
  const parsed = parseConstraint(constraint);

  if (isSatisfiedBy(parsed, version)) {
    out.success(`${version} satisfies ${constraint}`);
    return true;
  }
  out.error(`${version} does not satisfy ${constraint}`);
  return false;
}

/**
 * Setup the check command
 */
export function setupCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check whether a version satisfies a constraint')
    .argument('<constraint>', 'version constraint, e.g. ">=1.2.0" or "^2.0"')
    .argument('<version>', 'concrete version')
    .action(withErrorHandling(async (constraint: string, version: string) => {
      if (!checkCommand(constraint, version)) {
        process.exitCode = 1;
      }
    }));
}
