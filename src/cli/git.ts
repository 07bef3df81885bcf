import { Command } from 'commander';
import { editText } from '../editor.js';
import { deriveTopic } from '../git.js';
import { runGet } from './commands/queue.js';
import { loadContext, parsePollSeconds, type GlobalOpts } from './context.js';
import { EXIT_NOT_FOUND, handleError } from './errors.js';
import { printMessage } from './output.js';
import { readStdinText } from './input.js';

const PROG = 'git q';

/**
 * `git-q`: the queue commands with the topic taken from the repository
 * (`remote:branch`) instead of the command line.
 */
export function createGitProgram(): Command {
  const program = new Command();
  program
    .name('git-q')
    .version('0.1.0', '-V, --version')
    .description('Git-aware queue operations (topic is remote:branch)')
    .option('--dir <path>', 'Queue directory (overrides Q_DIR and XDG_STATE_HOME)')
    .option('--json', 'Print messages as JSON');

  program
    .command('put')
    .description("Open $EDITOR and enqueue into the repository's topic")
    .action(async () => {
      const opts = program.opts<GlobalOpts>();
      try {
        const topic = deriveTopic(process.cwd());
        const { store } = await loadContext(opts);
        console.log(await store.append(topic, editText('')));
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('readto')
    .description("Enqueue stdin into the repository's topic")
    .action(async () => {
      const opts = program.opts<GlobalOpts>();
      try {
        const topic = deriveTopic(process.cwd());
        const { store } = await loadContext(opts);
        console.log(await store.append(topic, readStdinText()));
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('get')
    .description("Dequeue from the repository's topic (exit 1 when empty)")
    .option('--block', 'Wait until a message exists')
    .option('--poll <seconds>', 'Polling interval with --block', parsePollSeconds)
    .action(async (cmdOpts: { block?: boolean; poll?: number }) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const topic = deriveTopic(process.cwd());
        const { store, config } = await loadContext(opts);
        const message = await runGet(store, topic, {
          block: cmdOpts.block,
          poll: cmdOpts.poll ?? config.poll_interval,
        });
        if (message === null) {
          process.exitCode = EXIT_NOT_FOUND;
          return;
        }
        printMessage(message, opts.json);
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  return program;
}

export async function runGitCli(argv: string[]): Promise<void> {
  await createGitProgram().parseAsync(argv);
}
