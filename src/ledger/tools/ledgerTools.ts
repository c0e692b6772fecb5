import { validationResult, ValidationChain } from 'express-validator';
import logger from '../../utils/logger.js';
import { toolCallCounter } from '../../metrics/metrics.js';
import {
  LedgerErrorKind,
  NotFoundError,
  ValidationError,
  toLedgerError,
} from '../../errors/LedgerError.js';
import type { RecordKind } from '../models/index.js';
import type { RecordChanges, RecordService } from '../services/recordService.js';
import type { SummaryService } from '../services/summaryService.js';
import {
  optionalAmount,
  optionalDate,
  optionalText,
  recordId,
  requiredAmount,
  requiredDate,
  requiredText,
} from './toolValidators.js';

export type ToolArguments = Record<string, unknown>;

export type ToolArgument = {
  name: string;
  required: boolean;
  description: string;
};

export type ToolDescriptor = {
  name: string;
  description: string;
  arguments: ToolArgument[];
};

type LedgerTool = ToolDescriptor & {
  aliases?: Record<string, string>;
  validators: ValidationChain[];
  successStatus?: number;
  handler: (args: ToolArguments) => Promise<unknown>;
};

export type ToolResponse =
  | { status: 'ok'; result: unknown }
  | { status: 'error'; error: { kind: LedgerErrorKind; message: string; details?: unknown } };

export type ToolOutcome = {
  httpStatus: number;
  body: ToolResponse;
};

export type LedgerToolkitDeps = {
  records: RecordService;
  summaries: SummaryService;
};

type KindNames = {
  add: string;
  list: string;
  edit: string;
  delete: string;
  summarize: string;
  idAlias: string;
  label: string;
};

const KIND_TOOL_NAMES: Record<RecordKind, KindNames> = {
  expense: {
    add: 'add_expense',
    list: 'list_expenses',
    edit: 'edit_expense',
    delete: 'delete_expense',
    summarize: 'summarize',
    idAlias: 'expense_id',
    label: 'expense',
  },
  credit: {
    add: 'add_credit',
    list: 'list_credits',
    edit: 'edit_credit',
    delete: 'delete_credit',
    summarize: 'summarize_credits',
    idAlias: 'credit_id',
    label: 'credit/income',
  },
};

const isPlainObject = (value: unknown): value is ToolArguments =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readOptional = <T>(args: ToolArguments, key: string, guard: (value: unknown) => value is T): T | undefined => {
  const value = args[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!guard(value)) {
    throw new ValidationError(`${key} has an unexpected type`);
  }
  return value;
};

const isString = (value: unknown): value is string => typeof value === 'string';
const isAmount = (value: unknown): value is number | string => typeof value === 'number' || typeof value === 'string';
const isNumber = (value: unknown): value is number => typeof value === 'number';

const readRequired = <T>(args: ToolArguments, key: string, guard: (value: unknown) => value is T): T => {
  const value = readOptional(args, key, guard);
  if (value === undefined) {
    throw new ValidationError(`${key} is required`);
  }
  return value;
};

const RECORD_FIELDS: ToolArgument[] = [
  { name: 'date', required: true, description: 'Calendar date, YYYY-MM-DD' },
  { name: 'amount', required: true, description: 'Non-negative amount with at most two decimals' },
  { name: 'category', required: true, description: 'Category from the catalog' },
  { name: 'subcategory', required: false, description: 'Subcategory of the chosen category' },
  { name: 'note', required: false, description: 'Free-text note' },
];

const RANGE_FIELDS: ToolArgument[] = [
  { name: 'start_date', required: true, description: 'Inclusive start, YYYY-MM-DD' },
  { name: 'end_date', required: true, description: 'Inclusive end, YYYY-MM-DD' },
];

function buildKindTools(kind: RecordKind, { records, summaries }: LedgerToolkitDeps): LedgerTool[] {
  const names = KIND_TOOL_NAMES[kind];

  return [
    {
      name: names.add,
      description: `Add a new ${names.label} entry to the database.`,
      arguments: RECORD_FIELDS,
      validators: [
        requiredDate('date'),
        requiredAmount(),
        requiredText('category'),
        optionalText('subcategory'),
        optionalText('note'),
      ],
      successStatus: 201,
      handler: async (args) => {
        const id = await records.add(kind, {
          date: readRequired(args, 'date', isString),
          amount: readRequired(args, 'amount', isAmount),
          category: readRequired(args, 'category', isString),
          subcategory: readOptional(args, 'subcategory', isString),
          note: readOptional(args, 'note', isString),
        });
        return { id };
      },
    },
    {
      name: names.list,
      description: `List ${names.label} entries within an inclusive date range.`,
      arguments: RANGE_FIELDS,
      validators: [requiredDate('start_date'), requiredDate('end_date')],
      handler: async (args) =>
        records.getRange(kind, readRequired(args, 'start_date', isString), readRequired(args, 'end_date', isString)),
    },
    {
      name: names.edit,
      description: `Edit an existing ${names.label} entry. Only provide values for fields you want to update.`,
      arguments: [
        { name: 'id', required: true, description: `Identifier of the ${names.label} entry` },
        ...RECORD_FIELDS.map((field) => ({ ...field, required: false })),
      ],
      aliases: { [names.idAlias]: 'id' },
      validators: [
        recordId(),
        optionalDate('date'),
        optionalAmount(),
        optionalText('category'),
        optionalText('subcategory'),
        optionalText('note'),
      ],
      handler: async (args) => {
        const changes: RecordChanges = {
          date: readOptional(args, 'date', isString),
          amount: readOptional(args, 'amount', isAmount),
          category: readOptional(args, 'category', isString),
          subcategory: readOptional(args, 'subcategory', isString),
          note: readOptional(args, 'note', isString),
        };
        return records.edit(kind, readRequired(args, 'id', isNumber), changes);
      },
    },
    {
      name: names.delete,
      description: `Delete a ${names.label} entry by ID.`,
      arguments: [{ name: 'id', required: true, description: `Identifier of the ${names.label} entry` }],
      aliases: { [names.idAlias]: 'id' },
      validators: [recordId()],
      handler: async (args) => records.delete(kind, readRequired(args, 'id', isNumber)),
    },
    {
      name: names.summarize,
      description: `Summarize ${names.label} entries by category within an inclusive date range.`,
      arguments: [
        ...RANGE_FIELDS,
        { name: 'category', required: false, description: 'Restrict the summary to one category' },
      ],
      validators: [requiredDate('start_date'), requiredDate('end_date'), optionalText('category')],
      handler: async (args) =>
        summaries.summarize(
          kind,
          readRequired(args, 'start_date', isString),
          readRequired(args, 'end_date', isString),
          readOptional(args, 'category', isString),
        ),
    },
  ];
}

// Every invoke resolves to a structured response, failures included.
export class LedgerToolkit {
  private readonly tools = new Map<string, LedgerTool>();

  constructor(deps: LedgerToolkitDeps) {
    const definitions: LedgerTool[] = [
      ...buildKindTools('expense', deps),
      ...buildKindTools('credit', deps),
      {
        name: 'categories',
        description: 'Return the expense and credit category catalog.',
        arguments: [],
        validators: [],
        handler: async () => deps.records.catalog,
      },
    ];
    for (const tool of definitions) {
      this.tools.set(tool.name, tool);
    }
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].map(({ name, description, arguments: args }) => ({
      name,
      description,
      arguments: args,
    }));
  }

  async invoke(name: string, rawArgs: unknown): Promise<ToolOutcome> {
    const tool = this.tools.get(name);
    try {
      if (!tool) {
        throw new NotFoundError(`Unknown tool "${name}"`);
      }
      const args = await this.validateArguments(tool, rawArgs ?? {});
      const result = await tool.handler(args);
      toolCallCounter.inc({ tool: name, outcome: 'ok' });
      return { httpStatus: tool.successStatus ?? 200, body: { status: 'ok', result } };
    } catch (error) {
      const failure = toLedgerError(error);
      toolCallCounter.inc({ tool: tool ? name : 'unknown', outcome: failure.kind });
      if (failure.status >= 500) {
        logger.error(`Tool ${name} failed: ${failure.message}`);
      } else {
        logger.warn(`Tool ${name} rejected: ${failure.kind} ${failure.message}`);
      }
      return {
        httpStatus: failure.status,
        body: {
          status: 'error',
          error: {
            kind: failure.kind,
            message: failure.message,
            ...(failure.details !== undefined ? { details: failure.details } : {}),
          },
        },
      };
    }
  }

  private async validateArguments(tool: LedgerTool, rawArgs: unknown): Promise<ToolArguments> {
    if (!isPlainObject(rawArgs)) {
      throw new ValidationError('Tool arguments must be a JSON object');
    }
    const args: ToolArguments = { ...rawArgs };
    for (const [alias, target] of Object.entries(tool.aliases ?? {})) {
      if (args[target] == null && args[alias] != null) {
        args[target] = args[alias];
      }
      delete args[alias];
    }

    const req = { body: args };
    for (const validator of tool.validators) {
      await validator.run(req);
    }
    const errors = validationResult(req);
    if (!errors.isEmpty()) {
      const details = errors.array({ onlyFirstError: true });
      throw new ValidationError(String(details[0].msg), details);
    }
    return req.body;
  }
}
