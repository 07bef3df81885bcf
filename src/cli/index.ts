import { Command } from 'commander';
import { editText } from '../editor.js';
import { deriveTopic } from '../git.js';
import { runPromptHook } from '../hooks/prompt.js';
import { runStopHook } from '../hooks/stop.js';
import { ALLOW } from '../hooks/common.js';
import { runConfigGet, runConfigSet } from './commands/config.js';
import {
  runCount,
  runDelete,
  runEdit,
  runGet,
  runList,
  runPeek,
  runPut,
  runReadTo,
  runReplace,
} from './commands/queue.js';
import {
  loadContext,
  parsePollSeconds,
  type GlobalOpts,
} from './context.js';
import { EXIT_NOT_FOUND, handleError } from './errors.js';
import { formatJson, formatTsvRow, summarize } from './format.js';
import { readStdinText } from './input.js';
import { emitHookResult, printMessage } from './output.js';

const PROG = 'q';

function notFound(): void {
  process.exitCode = EXIT_NOT_FOUND;
}

export function createProgram(): Command {
  const program = new Command();
  program
    .name(PROG)
    .version('0.1.0', '-V, --version')
    .description('Topic-based queues (file-backed, lock-protected)')
    .option('--dir <path>', 'Queue directory (overrides Q_DIR and XDG_STATE_HOME)')
    .option('--json', 'Print messages as JSON');

  program
    .command('put')
    .description(
      'Open $EDITOR and enqueue the text. Without a topic, the first line names it',
    )
    .argument('[topic]', 'Queue topic')
    .action(async (topic: string | undefined) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        console.log(await runPut(store, topic, editText));
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('readto')
    .description(
      'Enqueue stdin. Without a topic, the first line of input names it',
    )
    .argument('[topic]', 'Queue topic')
    .action(async (topic: string | undefined) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        console.log(await runReadTo(store, topic, readStdinText()));
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('get')
    .description('Dequeue the first message to stdout (exit 1 when empty)')
    .argument('<topic>', 'Queue topic')
    .option('--block', 'Wait until a message exists')
    .option('--poll <seconds>', 'Polling interval with --block', parsePollSeconds)
    .action(
      async (topic: string, cmdOpts: { block?: boolean; poll?: number }) => {
        const opts = program.opts<GlobalOpts>();
        try {
          const { store, config } = await loadContext(opts);
          const message = await runGet(store, topic, {
            block: cmdOpts.block,
            poll: cmdOpts.poll ?? config.poll_interval,
          });
          if (message === null) return notFound();
          printMessage(message, opts.json);
        } catch (err) {
          handleError(err, PROG, opts.json);
        }
      },
    );

  program
    .command('peek')
    .description('Print a message without removing it (default: the first)')
    .argument('<topic>', 'Queue topic')
    .argument('[uuid]', 'Message uuid')
    .action(async (topic: string, uuid: string | undefined) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        const message = await runPeek(store, topic, uuid);
        if (message === null) return notFound();
        printMessage(message, opts.json);
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('list')
    .description('List messages with uuid and a one-line summary')
    .argument('<topic>', 'Queue topic')
    .option('-q, --quiet', 'Only print uuids')
    .action(async (topic: string, cmdOpts: { quiet?: boolean }) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        const messages = await runList(store, topic);
        if (opts.json) {
          console.log(formatJson(messages));
          return;
        }
        for (const m of messages) {
          console.log(
            cmdOpts.quiet ? m.uuid : formatTsvRow([m.uuid, summarize(m.content)]),
          );
        }
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('count')
    .description('Print the number of queued messages')
    .argument('<topic>', 'Queue topic')
    .action(async (topic: string) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        const count = await runCount(store, topic);
        console.log(opts.json ? formatJson({ count }) : String(count));
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('del')
    .description('Delete a message by uuid (exit 1 when not found)')
    .argument('<topic>', 'Queue topic')
    .argument('<uuid>', 'Message uuid')
    .action(async (topic: string, uuid: string) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        if (!(await runDelete(store, topic, uuid))) notFound();
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('edit')
    .description('Open a message in $EDITOR, then replace it')
    .argument('<topic>', 'Queue topic')
    .argument('<uuid>', 'Message uuid')
    .action(async (topic: string, uuid: string) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        const outcome = await runEdit(store, topic, uuid, editText);
        if (outcome === 'changed') {
          console.error(
            `${PROG} edit: message changed before replace; edits discarded`,
          );
        }
        if (outcome !== 'replaced') notFound();
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  program
    .command('replace')
    .description('Replace a message with stdin (exit 1 when not found)')
    .argument('<topic>', 'Queue topic')
    .argument('<uuid>', 'Message uuid')
    .action(async (topic: string, uuid: string) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        if (!(await runReplace(store, topic, uuid, readStdinText()))) {
          notFound();
        }
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  const config = program.command('config').description('Manage configuration');

  config
    .command('get')
    .description('Print a configuration value')
    .argument('<key>', 'dir, poll_interval or hook_exit2')
    .action(async (key: string) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { configFile } = await loadContext(opts);
        const value = await runConfigGet(configFile, key);
        console.log(opts.json ? formatJson({ [key]: value ?? null }) : String(value ?? ''));
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  config
    .command('set')
    .description('Set a configuration value')
    .argument('<key>', 'dir, poll_interval or hook_exit2')
    .argument('<value>', 'New value')
    .action(async (key: string, value: string) => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { configFile } = await loadContext(opts);
        await runConfigSet(configFile, key, value);
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  const hook = program
    .command('hook')
    .description('Agent hook entry points (read the hook payload on stdin)');

  hook
    .command('prompt')
    .description('Enqueue "=qput ..." prompts for the current repository')
    .action(async () => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store, config } = await loadContext(opts);
        const result = await runPromptHook(readStdinText(), {
          store,
          deriveTopic: () => deriveTopic(process.cwd()),
          useExit2: process.env['Q_HOOK_EXIT2'] === '1' || config.hook_exit2,
        });
        emitHookResult(result);
      } catch (err) {
        handleError(err, PROG, opts.json);
      }
    });

  hook
    .command('stop')
    .description('Hand the next queued message back instead of stopping')
    .action(async () => {
      const opts = program.opts<GlobalOpts>();
      try {
        const { store } = await loadContext(opts);
        const result = await runStopHook({
          store,
          deriveTopic: () => deriveTopic(process.cwd()),
        });
        emitHookResult(result);
      } catch (err) {
        // The stop hook never blocks on its own failures.
        const message = err instanceof Error ? err.message : String(err);
        emitHookResult({ ...ALLOW, stderr: `q stop hook: ${message}\n` });
      }
    });

  return program;
}

export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}
