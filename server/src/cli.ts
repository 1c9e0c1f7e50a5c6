#!/usr/bin/env node
import 'dotenv/config';
import { installInterruptHandler, runCli } from './program.js';

installInterruptHandler();

runCli(process.argv).then((code) => {
  process.exitCode = code;
});
