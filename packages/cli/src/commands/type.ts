import { Command } from 'commander';
import { withProvider } from '../utils/context.js';
import { printError } from '../utils/output.js';

export function typeCommand(): Command {
  return new Command('type')
    .description('Print the content type of a resource URI')
    .argument('<uri>', 'tasks or tasks/<id>')
    .action((uri: string) => {
      try {
        console.log(withProvider((provider) => provider.getType(uri)));
      } catch (error) {
        printError(`${error}`);
        process.exitCode = 1;
      }
    });
}
