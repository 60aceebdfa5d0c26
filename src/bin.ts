#!/usr/bin/env node
import {main} from './cli';
import {eem} from './lib/utils';

main(process.argv.slice(2), {
	stdout: process.stdout,
	stderr: process.stderr,
	env: process.env,
	onInterrupt: (handler) => {
		process.on('SIGINT', handler);
		return () => {
			process.off('SIGINT', handler);
		};
	},
}).then(
	(code) => {
		process.exitCode = code;
	},
	(error) => {
		process.stderr.write(`${eem(error, true)}\n`);
		process.exitCode = 1;
	}
);
