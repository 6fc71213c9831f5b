import { Command, Option } from 'commander';

import { MsValidationError } from '../http/errors';
import type { OpenUrlFn } from '../utils/open-url';
import { runLabels, type LabelsAction } from '../workflows/labels';
import { runMsWorkloads, type MsWorkloadsAction } from '../workflows/ms-workloads';
import { WORKLOAD_STATES, WORKLOAD_TYPES, runNodesList } from '../workflows/nodes-list';
import { runNodesReboot } from '../workflows/nodes-reboot';
import {
  REMOTE_TEMPLATES,
  runNodesRemoteConnections,
  type RemoteConnectionsAction,
  type RemoteTemplate
} from '../workflows/nodes-remote-connections';
import { WORKLOAD_COMMANDS, runNodesWorkloadsState, type WorkloadCommand } from '../workflows/nodes-workloads-state';
import { runNodesDna, type NodesDnaAction } from '../workflows/nodes-dna';
import { runServiceOsDna, type ServiceOsDnaAction } from '../workflows/service-os-dna';
import type { AskFn, WorkflowContext } from '../workflows/types';
import { runWorkloadCreate, type WorkloadCreateAction } from '../workflows/workload-create';
import { WORKLOAD_TEMPLATE_TYPES, type WorkloadTemplateType } from '../workflows/workload-definition';

export interface SubcommandDeps {
  /** Resolved before any action runs. */
  context: () => WorkflowContext;
  ask: AskFn;
  openUrl: OpenUrlFn;
}

type Choice<T> = [flag: string, value: T | undefined];

/**
 * Actions of one subcommand exclude each other and one of them is required.
 */
export function exactlyOne<T>(commandName: string, choices: Array<Choice<T>>): T {
  const selected = choices.filter((choice): choice is [string, T] => choice[1] !== undefined);
  if (selected.length !== 1) {
    const flags = choices.map(([flag]) => flag).join(', ');
    throw new MsValidationError(`${commandName}: exactly one of ${flags} is required.`);
  }
  return selected[0][1];
}

function includes<T extends string>(values: readonly T[], value: string | undefined): value is T {
  return values.some((item) => item === value);
}

function registerWorkloadCreate(program: Command, deps: SubcommandDeps): void {
  program
    .command('workload_create')
    .description('Create a new workload on the management system, or write a template definition')
    .option('-f, --file <file>', 'Workload definition file in the work directory', 'wl_def.json')
    .addOption(new Option('-t, --template <type>', 'Write a template definition of this type').choices(WORKLOAD_TEMPLATE_TYPES))
    .option('-c, --create', 'Provision the workload(s) defined in the file')
    .option('-p, --path <globs>', 'Comma separated globs of workload files, relative to the work directory')
    .action(async (options: { file: string; template?: string; create?: boolean; path?: string }) => {
      const template: WorkloadTemplateType | undefined = includes(WORKLOAD_TEMPLATE_TYPES, options.template)
        ? options.template
        : undefined;
      const action = exactlyOne<WorkloadCreateAction>('workload_create', [
        ['--template', template ? { kind: 'template', template } : undefined],
        ['--create', options.create ? { kind: 'create' } : undefined]
      ]);
      await runWorkloadCreate(deps.context(), { file: options.file, action, path: options.path });
    });
}

interface MsWorkloadsCliOptions {
  file: string;
  path: string;
  type?: string;
  name?: string;
  id?: string;
  disabled?: boolean;
  version_name?: string;
  version_release_name?: string;
  version_size_above?: string;
  version_date_older_than?: string;
  version_list_filter?: string;
  nodes_file: string;
  wait?: boolean;
  list?: boolean;
  copy?: boolean;
  delete?: boolean;
  deploy?: boolean;
}

function registerMsWorkloads(program: Command, deps: SubcommandDeps): void {
  program
    .command('ms_workloads')
    .description('Write a workloads file from filter options and act on the listed workloads')
    .option('-f, --file <file>', 'Workloads file in the work directory', 'workloads.json')
    .option('-p, --path <directory>', 'Directory below the work directory for copied workloads', 'workload_files')
    .option('-t, --type <type>', `Workload type filter (${WORKLOAD_TYPES.join('|')})`)
    .option('-n, --name <name>', 'Workload name filter')
    .option('--id <id>', 'Workload id filter')
    .option('--disabled', 'Include disabled workloads')
    .option('-v, --version_name <name>', 'Version name filter')
    .option('-r, --version_release_name <name>', 'Version release name filter')
    .option('--version_size_above <size>', 'Only versions larger than <n>(B|KB|MB|GB)')
    .option('--version_date_older_than <date>', 'Only versions last modified before YYYY-MM-DD')
    .option('--version_list_filter <filter>', 'Slice <start>:<end> or index over versions sorted by creation date')
    .option('--nodes_file <file>', 'Nodes to deploy to', 'nodes.json')
    .option('--wait', 'Wait for deployments to finish')
    .option('-l, --list', 'List workloads')
    .option('-c, --copy', 'Copy workloads to the local directory')
    .option('--delete', 'Delete the listed workload versions')
    .option('-d, --deploy', 'Deploy the listed workloads to the nodes of the nodes file')
    .action(async (options: MsWorkloadsCliOptions) => {
      const action = exactlyOne<MsWorkloadsAction>('ms_workloads', [
        ['--list', options.list ? 'list' : undefined],
        ['--copy', options.copy ? 'copy' : undefined],
        ['--delete', options.delete ? 'delete' : undefined],
        ['--deploy', options.deploy ? 'deploy' : undefined]
      ]);
      await runMsWorkloads(deps.context(), {
        action,
        file: options.file,
        path: options.path,
        type: options.type,
        name: options.name,
        id: options.id,
        disabled: options.disabled,
        versionName: options.version_name,
        versionReleaseName: options.version_release_name,
        versionSizeAbove: options.version_size_above,
        versionDateOlderThan: options.version_date_older_than,
        versionListFilter: options.version_list_filter,
        nodesFile: options.nodes_file,
        wait: options.wait
      });
    });
}

interface NodesListCliOptions {
  file: string;
  add?: boolean;
  node_connected?: boolean;
  node_name?: string;
  node_path?: string;
  node_version?: string;
  node_model?: string;
  node_labels?: string;
  workload_name?: string;
  workload_id?: string;
  workload_version_name?: string;
  workload_version_id?: string;
  workload_status?: string;
  workload_type?: string;
}

function registerNodesList(program: Command, deps: SubcommandDeps): void {
  program
    .command('nodes_list')
    .description('Write a nodes file from filter options')
    .option('-f, --file <file>', 'Nodes file in the work directory', 'nodes.json')
    .option('-a, --add', 'Merge into the existing nodes file')
    .option('--node_connected', 'Only online nodes')
    .option('--node_name <name>', 'Node name filter')
    .option('--node_path <path>', 'Node tree path filter, folders joined by /')
    .option('--node_version <version>', 'Node firmware version filter')
    .option('--node_model <model>', 'Node model filter')
    .option('--node_labels <labels>', 'Label filter against key=<k>/value=<v>,...')
    .option('--workload_name <name>', 'Workload name filter')
    .option('--workload_id <id>', 'Workload id filter')
    .option('--workload_version_name <name>', 'Workload version name filter')
    .option('--workload_version_id <id>', 'Workload version id filter')
    .option('--workload_status <state>', `Workload state filter (${WORKLOAD_STATES.join('|')})`)
    .option('--workload_type <type>', `Workload type filter (${WORKLOAD_TYPES.join('|')})`)
    .action(async (options: NodesListCliOptions) => {
      await runNodesList(deps.context(), {
        file: options.file,
        add: options.add,
        nodeConnected: options.node_connected,
        nodeName: options.node_name,
        nodePath: options.node_path,
        nodeVersion: options.node_version,
        nodeModel: options.node_model,
        nodeLabels: options.node_labels,
        workloadName: options.workload_name,
        workloadId: options.workload_id,
        workloadVersionName: options.workload_version_name,
        workloadVersionId: options.workload_version_id,
        workloadStatus: options.workload_status,
        workloadType: options.workload_type
      });
    });
}

function registerNodesReboot(program: Command, deps: SubcommandDeps): void {
  program
    .command('nodes_reboot')
    .description('Reboot the nodes of the nodes file')
    .option('-f, --file <file>', 'Nodes file in the work directory', 'nodes.json')
    .option('-y, --yes', 'Reboot without asking')
    .action(async (options: { file: string; yes?: boolean }) => {
      await runNodesReboot(deps.context(), { file: options.file, yes: options.yes, ask: deps.ask });
    });
}

function registerNodesWorkloadsState(program: Command, deps: SubcommandDeps): void {
  program
    .command('nodes_workloads_state')
    .description('Change the state of all workloads listed in the nodes file')
    .option('-f, --file <file>', 'Nodes file in the work directory', 'nodes.json')
    .addOption(new Option('-s, --state <state>', 'Command sent to every workload').choices(WORKLOAD_COMMANDS).makeOptionMandatory())
    .action(async (options: { file: string; state: string }) => {
      if (!includes<WorkloadCommand>(WORKLOAD_COMMANDS, options.state)) {
        throw new MsValidationError(`Unknown workload state command: ${options.state}`);
      }
      await runNodesWorkloadsState(deps.context(), { file: options.file, state: options.state });
    });
}

interface RemoteConnectionsCliOptions {
  file: string;
  remotes_file: string;
  template_create?: string;
  list?: boolean;
  add?: boolean;
  delete?: boolean;
  establish?: boolean;
}

function registerNodesRemoteConnections(program: Command, deps: SubcommandDeps): void {
  program
    .command('nodes_remote_connections')
    .description('Manage remote connections of the nodes in the nodes file')
    .option('-f, --file <file>', 'Nodes file in the work directory', 'nodes.json')
    .option('-r, --remotes_file <file>', 'Remote connections file in the work directory', 'node_remotes.json')
    .addOption(
      new Option('-t, --template_create <template>', 'Write a remote connections template').choices(REMOTE_TEMPLATES)
    )
    .option('-l, --list', 'Write the remote connections of the nodes to the remotes file')
    .option('-a, --add', 'Add the remote connections of the remotes file to the nodes')
    .option('-d, --delete', 'Delete the remote connections of the remotes file from the nodes')
    .option('-e, --establish', 'Open the remote connections of the remotes file in the browser')
    .action(async (options: RemoteConnectionsCliOptions) => {
      const template: RemoteTemplate | undefined = includes(REMOTE_TEMPLATES, options.template_create)
        ? options.template_create
        : undefined;
      const action = exactlyOne<RemoteConnectionsAction>('nodes_remote_connections', [
        ['--template_create', template ? { kind: 'template', template } : undefined],
        ['--list', options.list ? { kind: 'list' } : undefined],
        ['--add', options.add ? { kind: 'add' } : undefined],
        ['--delete', options.delete ? { kind: 'delete' } : undefined],
        ['--establish', options.establish ? { kind: 'establish' } : undefined]
      ]);
      await runNodesRemoteConnections(deps.context(), {
        file: options.file,
        remotesFile: options.remotes_file,
        action,
        openUrl: deps.openUrl
      });
    });
}

function registerLabels(program: Command, deps: SubcommandDeps): void {
  program
    .command('labels')
    .description('Manage labels on the management system')
    .option('-f, --file <file>', 'Labels file in the work directory', 'labels.json')
    .option('-l, --list', 'Write all labels to the file')
    .option('-a, --add', 'Create the labels of the file')
    .option('-d, --delete', 'Delete the labels of the file')
    .action(async (options: { file: string; list?: boolean; add?: boolean; delete?: boolean }) => {
      const action = exactlyOne<LabelsAction>('labels', [
        ['--list', options.list ? 'list' : undefined],
        ['--add', options.add ? 'add' : undefined],
        ['--delete', options.delete ? 'delete' : undefined]
      ]);
      await runLabels(deps.context(), { file: options.file, action });
    });
}

interface ServiceOsDnaCliOptions {
  file: string;
  put_target?: string;
  get_current?: boolean;
  get_target?: boolean;
  status?: boolean;
  cancel?: boolean;
  re_apply?: boolean;
}

function registerServiceOsDna(program: Command, deps: SubcommandDeps): void {
  program
    .command('service_os_dna')
    .description('ServiceOS DNA of the nodes in the nodes file')
    .option('-f, --file <file>', 'Nodes file in the work directory', 'nodes.json')
    .option('--put_target <file>', 'Set the target DNA from a file in the work directory')
    .option('--get_current', 'Write the current DNA of each node')
    .option('--get_target', 'Write the target DNA of each node')
    .option('--status', 'Log the DNA status of each node')
    .option('--cancel', 'Cancel the pending target DNA')
    .option('--re_apply', 'Apply the target DNA again')
    .action(async (options: ServiceOsDnaCliOptions) => {
      const action = exactlyOne<ServiceOsDnaAction>('service_os_dna', [
        ['--put_target', options.put_target ? { kind: 'putTarget', dnaFile: options.put_target } : undefined],
        ['--get_current', options.get_current ? { kind: 'getCurrent' } : undefined],
        ['--get_target', options.get_target ? { kind: 'getTarget' } : undefined],
        ['--status', options.status ? { kind: 'status' } : undefined],
        ['--cancel', options.cancel ? { kind: 'cancel' } : undefined],
        ['--re_apply', options.re_apply ? { kind: 'reapply' } : undefined]
      ]);
      await runServiceOsDna(deps.context(), { file: options.file, action });
    });
}

interface NodesDnaCliOptions {
  file: string;
  put_target?: string;
  get_current?: boolean;
  get_target?: boolean;
  status?: boolean;
  strip_hash?: boolean;
  restart_all_workloads?: boolean;
  continue_after_restart?: boolean;
}

function registerNodesDna(program: Command, deps: SubcommandDeps): void {
  program
    .command('nodes_dna')
    .description('DNA configuration of the nodes in the nodes file')
    .option('-f, --file <file>', 'Nodes file in the work directory', 'nodes.json')
    .option('--put_target <files>', 'Deploy a target DNA zipped from comma separated work files (yaml and env files)')
    .option('--get_current', 'Write the current DNA of each node into <work dir>/<serial number>')
    .option('--get_target', 'Write the target DNA of each node into <work dir>/<serial number>')
    .option('--status', 'Log the DNA status of each node')
    .option('-s, --strip_hash', 'Strip workload hashes from fetched DNA')
    .option('-r, --restart_all_workloads', 'Restart all workloads after deploying the DNA')
    .option('-c, --continue_after_restart', 'Continue the DNA deployment when the node restarts')
    .action(async (options: NodesDnaCliOptions) => {
      const stripHash = options.strip_hash === true;
      const action = exactlyOne<NodesDnaAction>('nodes_dna', [
        [
          '--put_target',
          options.put_target
            ? {
                kind: 'putTarget',
                dnaFiles: options.put_target,
                restartAllWorkloads: options.restart_all_workloads === true,
                continueAfterRestart: options.continue_after_restart === true
              }
            : undefined
        ],
        ['--get_current', options.get_current ? { kind: 'getCurrent', stripHash } : undefined],
        ['--get_target', options.get_target ? { kind: 'getTarget', stripHash } : undefined],
        ['--status', options.status ? { kind: 'status' } : undefined]
      ]);
      await runNodesDna(deps.context(), { file: options.file, action });
    });
}

function registerLogout(program: Command, deps: SubcommandDeps): void {
  program
    .command('logout')
    .description('Logout from the management system')
    .action(async () => {
      const { client, logger } = deps.context();
      await client.logout();
      logger.info('Logged out from the management system.');
    });
}

/**
 * The verbs shared by the command line and the interactive shell.
 */
export function registerSubcommands(program: Command, deps: SubcommandDeps): Command {
  registerWorkloadCreate(program, deps);
  registerMsWorkloads(program, deps);
  registerNodesList(program, deps);
  registerNodesReboot(program, deps);
  registerServiceOsDna(program, deps);
  registerNodesDna(program, deps);
  registerNodesWorkloadsState(program, deps);
  registerNodesRemoteConnections(program, deps);
  registerLabels(program, deps);
  registerLogout(program, deps);
  return program;
}
