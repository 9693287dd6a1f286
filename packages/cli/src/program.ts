/**
 * CARP CLI
 *
 * Inspect schema types and perform calls against remote receivers.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import * as path from 'path';
import { ExternalName, isCarpError, parseWireJson, stringifyWire } from '@carp/protocol';
import {
  ClientPresence,
  configFromEnv,
  loadClientConfig,
  resolveClientConfig,
  type CarpProxy,
  type ClientConfig,
  type RemoteMethod,
  type TransportClient,
} from '@carp/runtime';
import { ScopeArena, TypeResolver, scopeChainFromPaths } from '@carp/schema';
import { TraceCollector, loadTraceFile, verifyChain } from '@carp/trace';
import { reportType, toJsonValue, type TypeReport } from './report.js';

export interface CliDependencies {
  /** Transport for `call`; HTTP when absent */
  transport?: TransportClient;
  env?: NodeJS.ProcessEnv;
  out?: (line: string) => void;
  err?: (line: string) => void;
  exit?: (code: number) => void;
}

interface InspectOptions {
  scope?: string[];
  json?: boolean;
}

interface CallOptions {
  scope?: string[];
  config?: string;
}

/**
 * Arguments are JSON; anything that does not parse is taken as a string.
 * Integers too wide for a number become bigint.
 */
export function parseArgument(text: string): unknown {
  try {
    return parseWireJson(text);
  } catch {
    return text;
  }
}

function methodOf(proxy: CarpProxy, callName: string): RemoteMethod | undefined {
  if (Object.hasOwn(proxy, callName)) return proxy[callName];
  const method = ExternalName.parse(callName).asMethodName();
  return Object.hasOwn(proxy, method) ? proxy[method] : undefined;
}

function printReport(report: TypeReport, out: (line: string) => void): void {
  out(chalk.blue(`${report.name} (${report.kind})`));
  out(chalk.gray(`  Scope: ${report.scope}`));
  if (report.native) {
    out(chalk.gray(`  Native: ${report.native.target} ${report.native.symbol}`));
  }
  if (report.type) {
    out(chalk.gray(`  Type: ${report.type}`));
  }
  if (report.inherits && report.inherits.length > 0) {
    out(chalk.gray(`  Inherits: ${report.inherits.join(', ')}`));
  }

  for (const call of report.calls ?? []) {
    const params = call.params.map(p => `${p.name}${p.required ? '' : '?'}: ${p.type}`);
    out(chalk.green(`  ${call.method}(${params.join(', ')})`));
    if (call.responses.length === 0) {
      out(chalk.gray('    -> (no response)'));
    }
    for (const response of call.responses) {
      const fields = response.fields.map(f => `${f.name}${f.required ? '' : '?'}: ${f.type}`);
      out(chalk.gray(`    -> ${response.name}${fields.length > 0 ? ` { ${fields.join(', ')} }` : ''}`));
    }
  }
}

export function createProgram(deps: CliDependencies = {}): Command {
  const env = deps.env ?? process.env;
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  const fail = (error: unknown): void => {
    const message = error instanceof Error ? error.message : String(error);
    const code = isCarpError(error) ? ` [${error.code}]` : '';
    err(chalk.red(`Error${code}: ${message}`));
    exit(1);
  };

  const scopeLayer = (scope?: string[]): ClientConfig =>
    scope ? { scope_paths: scope.map(p => path.resolve(p)) } : {};

  const program = new Command();

  program
    .name('carp')
    .description('CARP client: inspect schema types and call remote receivers')
    .version('0.1.0');

  // ===========================================================================
  // Inspect Command
  // ===========================================================================

  program
    .command('inspect <type>')
    .description('Resolve a type and describe it')
    .option('-s, --scope <dir...>', 'Scope directories, root first')
    .option('-j, --json', 'Output as JSON')
    .action(async (typeName: string, options: InspectOptions) => {
      const config = resolveClientConfig(configFromEnv(env), scopeLayer(options.scope));
      const trace = new TraceCollector({ component: 'carp.cli', min_severity: config.trace_min_severity });
      const resolver = new TypeResolver(new ScopeArena(), { trace });

      try {
        const scope = scopeChainFromPaths(resolver.arena, config.scope_paths);
        const report = reportType(await resolver.resolveClosure(typeName, scope));
        if (options.json) {
          out(JSON.stringify(report, null, 2));
        } else {
          printReport(report, out);
        }
      } catch (error) {
        fail(error);
      } finally {
        await trace.close();
      }
    });

  // ===========================================================================
  // Call Command
  // ===========================================================================

  program
    .command('call <endpoint> <type> <call> [args...]')
    .description('Call a remote receiver and print the response as JSON')
    .option('-s, --scope <dir...>', 'Scope directories, root first')
    .option('-c, --config <file>', 'Client configuration file (JSON or YAML)')
    .action(async (endpoint: string, typeName: string, callName: string, args: string[], options: CallOptions) => {
      let presence: ClientPresence | undefined;

      try {
        const fileConfig = options.config ? await loadClientConfig(options.config) : {};
        const config = resolveClientConfig(configFromEnv(env), fileConfig, scopeLayer(options.scope));
        presence = new ClientPresence({ config, transport: deps.transport });
        if (options.config) {
          presence.getTrace().record('system.config.loaded', { file: path.resolve(options.config) });
        }

        const proxy = await presence.getProxy(typeName, endpoint);
        const method = methodOf(proxy, callName);
        if (!method) {
          throw new Error(`${typeName} has no call ${callName}`);
        }

        const result = await method(...args.map(parseArgument));
        out(stringifyWire(toJsonValue(result), 2));
      } catch (error) {
        fail(error);
      } finally {
        await presence?.close();
      }
    });

  // ===========================================================================
  // Trace Commands
  // ===========================================================================

  const traceCmd = program
    .command('trace')
    .description('Trace log commands');

  traceCmd
    .command('verify <file>')
    .description('Verify the hash chain of a trace file')
    .action(async (file: string) => {
      try {
        const events = await loadTraceFile(file);
        const { valid, errors } = verifyChain(events);

        if (valid) {
          out(chalk.green('✓ Trace integrity verified'));
          out(chalk.gray(`  Events: ${events.length}`));
        } else {
          out(chalk.red('✗ Trace integrity check failed'));
          for (const error of errors) {
            out(chalk.red(`  ${error}`));
          }
          exit(1);
        }
      } catch (error) {
        fail(error);
      }
    });

  return program;
}
