import { posix } from 'node:path';
import { type CommandOptions, type CommandResult, formatCommand, type HostRuntime } from '../infra/hostRuntime';

export interface FakeHostOptions {
  cwd?: string;
  uid?: number | null;
  user?: string;
  users?: string[];
  dirs?: string[];
  files?: Record<string, string>;
  env?: NodeJS.ProcessEnv;
  // Returning a result short-circuits the built-in behaviour of that command
  override?: (command: string, args: readonly string[]) => Partial<CommandResult> | undefined;
}

export interface FakeFile {
  content: string;
  mode: number;
}

export const SOURCE_DIR = '/home/dev/trading-bot';

const ok = (stdout = ''): CommandResult => ({ ok: true, stdout, stderr: '', exitCode: 0 });
const failed = (exitCode: number, stderr: string): CommandResult => ({
  ok: false,
  stdout: '',
  stderr,
  error: `Command failed: ${stderr}`,
  exitCode,
});

/**
 * In-process stand-in for a Debian host: a virtual filesystem, an account
 * table and canned behaviour for the commands the provisioner runs.
 */
export class FakeHost implements HostRuntime {
  public readonly cwd: string;
  public readonly env: NodeJS.ProcessEnv;
  public readonly commands: string[] = [];
  public readonly commandOptions: Array<CommandOptions | undefined> = [];
  public readonly dirs = new Set<string>(['/']);
  public readonly files = new Map<string, FakeFile>();
  public readonly users: Set<string>;
  public readonly systemPackages = new Set<string>();
  public readonly pythonPackages = new Set<string>();
  public uid: number | null;
  private readonly user: string;
  private readonly override: FakeHostOptions['override'];

  constructor(options: FakeHostOptions = {}) {
    this.cwd = options.cwd ?? SOURCE_DIR;
    this.env = options.env ?? {};
    this.uid = options.uid === undefined ? 1000 : options.uid;
    this.user = options.user ?? 'dev';
    this.users = new Set(options.users ?? ['root', this.user]);
    this.override = options.override;

    this.makeDirectory(this.cwd);
    for (const dir of options.dirs ?? []) this.makeDirectory(dir);
    for (const [path, content] of Object.entries(options.files ?? {})) {
      this.makeDirectory(posix.dirname(path));
      this.files.set(path, { content, mode: 0o644 });
    }
  }

  public getUid(): number | null {
    return this.uid;
  }

  public currentUser(): string {
    return this.user;
  }

  public pathExists(path: string): boolean {
    return this.dirs.has(path) || this.files.has(path);
  }

  public makeDirectory(path: string): boolean {
    if (this.files.has(path)) {
      throw new Error(`EEXIST: file already exists, mkdir '${path}'`);
    }
    const created = !this.dirs.has(path);
    let current = path;
    while (!this.dirs.has(current)) {
      this.dirs.add(current);
      current = posix.dirname(current);
    }
    return created;
  }

  public writeFile(path: string, content: string, mode: number): void {
    if (!this.dirs.has(posix.dirname(path))) {
      throw new Error(`ENOENT: no such file or directory, open '${path}'`);
    }
    this.files.set(path, { content, mode });
  }

  public read(path: string): string {
    const file = this.files.get(path);
    if (!file) throw new Error(`no fake file at ${path}`);
    return file.content;
  }

  public ran(command: string): boolean {
    return this.commands.includes(command);
  }

  public async runCommand(command: string, args: readonly string[], options?: CommandOptions): Promise<CommandResult> {
    this.commands.push(formatCommand(command, args));
    this.commandOptions.push(options);

    const forced = this.override?.(command, args);
    if (forced) {
      return { ...failed(1, 'forced failure'), ...forced };
    }

    if (command === 'id') {
      return this.users.has(args[0]) ? ok(`uid=1001(${args[0]})`) : failed(1, `id: '${args[0]}': no such user`);
    }
    if (command === 'useradd') {
      const name = args[args.length - 1];
      this.users.add(name);
      this.makeDirectory(`/home/${name}`);
      return ok();
    }
    if (command === 'apt-get' && args[0] === 'install') {
      for (const name of args.slice(2)) this.systemPackages.add(name);
      if (this.systemPackages.has('supervisor')) this.makeDirectory('/etc/supervisor/conf.d');
      return ok();
    }
    if (args[0] === '--version') {
      return ok('Python 3.11.4\n');
    }
    if (args[0] === '-m' && args[1] === 'venv') {
      this.makeDirectory(posix.join(args[2], 'bin'));
      return ok();
    }
    if (command.endsWith('/bin/pip') && args[0] === 'install' && args[1] === '-r') {
      const manifest = this.files.get(args[2]);
      if (!manifest) return failed(1, `ERROR: Could not open requirements file: ${args[2]}`);
      manifest.content
        .split('\n')
        .map(line => line.trim())
        .filter(line => line && !line.startsWith('#'))
        .forEach(line => this.pythonPackages.add(line));
      return ok();
    }
    return ok();
  }
}
