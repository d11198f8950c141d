import chalk from 'chalk';
import { setLogLevel } from '@caseflow/core';

// Keep test output readable and colour-free
chalk.level = 0;
setLogLevel('silent');
