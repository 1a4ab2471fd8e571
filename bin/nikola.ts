#!/usr/bin/env node
import { main } from '../lib/main';
import { SimpleError } from '../lib/util/flow';
import { error } from '../lib/util/log';

main(process.argv.slice(2)).then(code => {
  process.exitCode = code;
}).catch(e => {
  if (e instanceof SimpleError) {
    error(e.message);
  } else {
    // eslint-disable-next-line no-console
    console.error(e);
  }
  process.exitCode = 1;
});
