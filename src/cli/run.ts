import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { compile_dsl } from '../compiler/from-dsl';
import { Extra, type ValidationIssue } from '../types';
import { format_path } from '../utils/path.util';

/** 生成一个“写入器”：接收字符串和文件名，落到 baseDir 下；若是 JSON 字符串则按 spaces 重新缩进 */
export function create_folder_writer(baseDir: string, spaces = 2) {
  return async (content: string, filename: string): Promise<string> => {
    const target = join(baseDir, filename);
    await mkdir(dirname(target), { recursive: true });

    // 合法 JSON → 统一格式化；否则原样写入；都保证末尾换行
    let text: string;
    try {
      const parsed: unknown = JSON.parse(content);
      text = JSON.stringify(parsed, null, spaces);
    } catch {
      text = content;
    }
    if (!text.endsWith('\n')) text += '\n';

    await writeFile(target, text, 'utf8');
    return target;
  };
}

export type CliOptions = {
  pretty?: string | boolean;
  minify?: boolean;
  out?: string; // 可选：自定义输出文件名，默认 output.json
  extra?: string;
  enforceInclusive?: boolean;
  mock?: string; // 种子；给出时只生成 mock.json
  describe?: boolean;
};

export function to_pretty_spaces(opt: CliOptions): number {
  if (opt.minify) return 0;
  if (opt.pretty === false) return 0;
  if (opt.pretty === true || opt.pretty === undefined) return 2;
  const n = Number(opt.pretty);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : 2;
}

/** 一行一个问题：[CODE] data['a'][0] : message */
export function format_cli_issue(e: ValidationIssue): string {
  return `[${e.code}] ${format_path(e.path)} : ${e.message}`;
}

function to_extra(value: string | undefined): Extra | undefined {
  switch (value) {
    case 'prevent':
      return Extra.Prevent;
    case 'allow':
      return Extra.Allow;
    case 'remove':
      return Extra.Remove;
    default:
      return undefined;
  }
}

// native 值里的 bigint 以字符串写出；Decimal / Date 自带 toJSON
function json_replacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

async function read_json(path: string): Promise<{ ok: true; value: unknown } | { ok: false }> {
  const content = await readFile(path, 'utf8');
  console.log(`Reading: ${path}`);
  try {
    const value: unknown = JSON.parse(content);
    return { ok: true, value };
  } catch (e) {
    console.error(`❌ Invalid JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`);
    return { ok: false };
  }
}

function print_issues(title: string, errors: readonly ValidationIssue[]) {
  console.error(`❌ ${title} with ${errors.length} error(s):`);
  for (const e of errors) console.error(`  - ${format_cli_issue(e)}`);
}

/**
 * 执行一次 CLI：读取 <folder>/schema.json，转换 <folder>/input.json
 * @returns 进程退出码（0 成功，1 失败）
 */
export async function run(folder: string, opts: CliOptions): Promise<number> {
  const spaces = to_pretty_spaces(opts);
  const baseDir = resolve(folder);
  const write = create_folder_writer(baseDir, spaces);

  try {
    /***
     * 步骤: Compile
     * *****
     */
    const schema_doc = await read_json(join(baseDir, 'schema.json'));
    if (!schema_doc.ok) return 1;

    const compiled = compile_dsl(schema_doc.value, {
      extra: to_extra(opts.extra),
      enforce_inclusive: opts.enforceInclusive ?? false,
    });
    if (!compiled.ok || !compiled.schema) {
      print_issues('Schema invalid', compiled.errors);
      return 1;
    }
    const schema = compiled.schema;

    if (opts.describe) {
      const target = await write(JSON.stringify({ schema_id: schema.schema_id, schema: schema.describe() }), 'schema.out.json');
      console.log(`✅ Description written to: ${target}`);
    }

    /***
     * 步骤: Mock（给出种子时不读取 input.json）
     * *****
     */
    if (opts.mock !== undefined) {
      const seed = Number(opts.mock);
      if (!Number.isInteger(seed)) {
        console.error(`❌ Invalid seed: ${opts.mock}`);
        return 1;
      }
      const target = await write(JSON.stringify(schema.to_dto(schema.mock(seed)), json_replacer), 'mock.json');
      console.log(`✅ Mock written to: ${target}`);
      return 0;
    }

    /***
     * 步骤: Convert
     * *****
     */
    const input = await read_json(join(baseDir, 'input.json'));
    if (!input.ok) return 1;

    const result = schema.safe_parse(input.value);
    if (!result.ok) {
      print_issues('Conversion failed', result.errors);
      return 1;
    }
    const target = await write(JSON.stringify(result.value, json_replacer), opts.out ?? 'output.json');
    console.log(`✅ Output written to: ${target}`);
    return 0;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      console.error(`❌ Not found: ${'path' in err ? String(err.path) : folder}`);
    } else {
      console.error(`💥 Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }
}
