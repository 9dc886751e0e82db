import chalk from 'chalk';
import { formatValidationIssue, type Logger } from '@acqpar/core';
import type { ValidateResult } from '../commands/validate.js';
import type { DescribeResult } from '../commands/describe.js';
import type { OrderResult } from '../commands/order.js';
import type { EvaluateResult } from '../commands/evaluate.js';

export type OutputLogger = Pick<Logger, 'info'>;

export function displayValidateResult(result: ValidateResult, logger: OutputLogger): void {
  if (result.error) {
    logger.info(chalk.red(`Invalid definition file: ${result.path}`));
    logger.info(result.error);
    return;
  }

  const status = result.valid ? chalk.green('Valid') : chalk.red('Invalid');
  logger.info(`${status} ${chalk.bold(result.path)}`);
  logger.info(`  Parameters: ${result.parameterCount ?? 0}`);
  if (result.sections && result.sections.length > 0) {
    logger.info(`  Sections: ${result.sections.join(', ')}`);
  }

  for (const issue of result.errors ?? []) {
    logger.info(chalk.red(formatValidationIssue(issue)));
  }
  for (const issue of result.warnings ?? []) {
    logger.info(chalk.yellow(formatValidationIssue(issue)));
  }
}

export function displayDescribeResult(result: DescribeResult, logger: OutputLogger): void {
  logger.info(`${chalk.bold('Definition file')}: ${result.path}`);
  logger.info(`Parameters: ${result.parameterCount}`);

  for (const section of result.sections) {
    logger.info('');
    logger.info(chalk.bold(`=== ${section.label ?? '(no header)'} ===`));
    for (const parameter of section.parameters) {
      const details: string[] = [parameter.type ?? parameter.kind];
      if (parameter.range) {
        details.push(`range ${parameter.range}`);
      }
      if (parameter.unit) {
        details.push(`unit ${parameter.unit}`);
      }
      if (!parameter.editable) {
        details.push('NONEDIT');
      }
      const label = parameter.key === parameter.name ? parameter.name : `${parameter.name} (${parameter.key})`;
      logger.info(`  • ${chalk.blue(label)}: ${details.join(', ')}`);
      if (parameter.text) {
        logger.info(`      ${parameter.text}`);
      }
      if (parameter.rel) {
        logger.info(`      REL     ${parameter.rel}`);
      }
      if (parameter.invRel) {
        logger.info(`      INV_REL ${parameter.invRel}`);
      }
      if (parameter.extFunction) {
        logger.info(`      EXTFUNCT ${parameter.extFunction}`);
      }
    }
  }
}

export function displayOrderResult(result: OrderResult, logger: OutputLogger): void {
  const { plan } = result;
  logger.info(`${chalk.bold('Changed')}: ${plan.changed.join(', ')}`);

  if (plan.inverse.length > 0) {
    logger.info(chalk.bold('Inverse relations:'));
    for (const step of plan.inverse) {
      const targets = step.targets.length > 0 ? step.targets.join(', ') : '(none)';
      logger.info(`  • ${chalk.blue(step.parameter)} → ${targets}`);
    }
  }

  if (plan.order.length === 0) {
    logger.info(chalk.dim('Nothing to recompute.'));
    return;
  }
  logger.info(chalk.bold('Recompute order:'));
  plan.layers.forEach((layer, index) => {
    logger.info(`  Layer ${index}: ${layer.join(', ')}`);
  });
}

export function displayEvaluateResult(result: EvaluateResult, logger: OutputLogger): void {
  logger.info(`${chalk.bold('Definition file')}: ${result.path}`);
  logger.info(chalk.dim(`Seeded ${result.seeded} raw value${result.seeded === 1 ? '' : 's'}`));

  if (result.update) {
    for (const change of result.update.applied) {
      logger.info(`Set ${chalk.blue(change.key)} = ${change.value}`);
    }
    for (const write of result.update.inverse) {
      logger.info(`  INV_REL of ${write.parameter}: ${chalk.blue(write.key)} = ${write.value}`);
    }
  }

  let section: string | undefined;
  for (const parameter of result.parameters) {
    if (parameter.section !== undefined && parameter.section !== section) {
      section = parameter.section;
      logger.info('');
      logger.info(chalk.bold(`=== ${section} ===`));
    }
    const value = parameter.display ?? chalk.dim('(unset)');
    const marker = parameter.stale ? ` ${chalk.yellow('[stale]')}` : '';
    logger.info(`  ${parameter.name.padEnd(10)} ${value}${marker}`);
  }

  if (result.stale.length > 0) {
    logger.info('');
    logger.info(chalk.yellow('Stale parameters:'));
    for (const entry of result.stale) {
      logger.info(`  • ${entry.key} [${entry.code}]: ${entry.reason}`);
    }
  }

  const inconsistent = result.roundTrips.filter((check) => !check.consistent);
  if (inconsistent.length > 0) {
    logger.info('');
    logger.info(chalk.yellow('REL / INV_REL mismatches:'));
    for (const check of inconsistent) {
      for (const deviation of check.deviations) {
        logger.info(`  • ${check.parameter}: ${deviation.key} is ${deviation.actual}, INV_REL gives ${deviation.expected}`);
      }
    }
  }
}
