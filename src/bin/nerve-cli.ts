#!/usr/bin/env node

import { runCli } from '../cli/index';
import { exitCodeOf, reportCliError } from '../cli/report-error';
import { toProblemDetails } from '../contracts/problem';
import { getLogger } from '../observability/logger';
import { resolveCliErrorFormat } from '../utils/error-format';

runCli().catch((error: unknown) => {
  const errorFormat = resolveCliErrorFormat(process.argv.slice(2), process.env.NERVE_ERROR_FORMAT);
  if (errorFormat === 'json') {
    process.stderr.write(`${JSON.stringify(toProblemDetails(error), null, 2)}\n`);
    process.exit(exitCodeOf(error));
    return;
  }

  reportCliError(getLogger(), error);
  process.exit(exitCodeOf(error));
});
