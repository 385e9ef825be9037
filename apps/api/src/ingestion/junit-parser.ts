/**
 * JUnit XML streaming parser
 *
 * Turns <testcase> elements into normalized results. Uses SAX so large
 * reports are never held as a DOM.
 */

import { createReadStream } from 'fs';
import { Readable } from 'stream';

import {
  INGESTION_SETTINGS,
  ValidationError,
  truncateString,
  type NormalizedResult,
  type ParsedReport,
  type TestStatus,
} from '@flakelens/shared';
import * as sax from 'sax';

type OpenTag = sax.Tag | sax.QualifiedTag;

/**
 * Mutable parser state for the testcase being read
 */
interface CaseState {
  readonly testId: string;
  readonly durationSeconds: number;
  readonly position: number;
  status: TestStatus;
  message: string;
  detail: string;
  capturing: boolean;
}

interface ParserState {
  readonly suites: string[];
  readonly results: NormalizedResult[];
  readonly warnings: string[];
  suiteCount: number;
  position: number;
  current?: CaseState;
}

const OUTCOME_ELEMENTS: Readonly<Record<string, TestStatus>> = {
  failure: 'fail',
  error: 'error',
  skipped: 'skipped',
};

function attribute(tag: OpenTag, name: string): string | undefined {
  const value = tag.attributes[name];
  if (value === undefined) {
    return undefined;
  }
  return typeof value === 'string' ? value : value.value;
}

/**
 * Parse a JUnit time attribute; reporters sometimes write thousands separators
 */
export function parseDuration(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') {
    return 0;
  }
  const value = Number(raw.replace(/,/g, ''));
  return Number.isFinite(value) ? value : 0;
}

export function buildTestId(className: string | undefined, name: string, suite: string | undefined): string {
  const prefix = className?.trim() || suite?.trim();
  return prefix ? `${prefix}.${name}` : name;
}

function handleOpenTag(state: ParserState, tag: OpenTag): void {
  switch (tag.name) {
    case 'testsuite':
      state.suiteCount++;
      state.suites.push(attribute(tag, 'name') ?? '');
      return;

    case 'testcase': {
      const name = attribute(tag, 'name')?.trim();
      const position = state.position++;
      if (!name) {
        state.warnings.push(`testcase at position ${position} has no name and was ignored`);
        state.current = undefined;
        return;
      }
      state.current = {
        testId: buildTestId(attribute(tag, 'classname'), name, state.suites[state.suites.length - 1]),
        durationSeconds: parseDuration(attribute(tag, 'time')),
        position,
        status: 'pass',
        message: '',
        detail: '',
        capturing: false,
      };
      return;
    }

    default: {
      const current = state.current;
      const status = OUTCOME_ELEMENTS[tag.name];
      if (!current || !status) return;

      // First outcome element wins; a later <skipped> does not hide a failure
      if (current.status === 'pass') {
        current.status = status;
        current.message = attribute(tag, 'message') ?? '';
        current.capturing = status !== 'skipped';
      }
    }
  }
}

function handleCloseTag(state: ParserState, name: string): void {
  switch (name) {
    case 'testsuite':
      state.suites.pop();
      return;

    case 'testcase': {
      const current = state.current;
      if (!current) return;

      const message = (current.message.trim() || current.detail.trim()) || undefined;
      state.results.push({
        testId: current.testId,
        status: current.status,
        durationSeconds: current.durationSeconds,
        errorMessage: current.status === 'fail' || current.status === 'error'
          ? message && truncateString(message, INGESTION_SETTINGS.MAX_ERROR_MESSAGE_LENGTH)
          : undefined,
        position: current.position,
      });
      state.current = undefined;
      return;
    }

    default:
      if (state.current && OUTCOME_ELEMENTS[name]) {
        state.current.capturing = false;
      }
  }
}

function handleText(state: ParserState, text: string): void {
  if (state.current?.capturing) {
    state.current.detail += text;
  }
}

/**
 * Parse a JUnit XML stream into normalized results
 */
export function parseJUnitStream(stream: Readable, source = '<stream>'): Promise<ParsedReport> {
  return new Promise((resolve, reject) => {
    const state: ParserState = {
      suites: [],
      results: [],
      warnings: [],
      suiteCount: 0,
      position: 0,
    };

    const parser = sax.createStream(true, { trim: false, normalize: false });

    parser.on('opentag', (tag: OpenTag) => handleOpenTag(state, tag));
    parser.on('closetag', (name: string) => handleCloseTag(state, name));
    parser.on('text', (text: string) => handleText(state, text));
    parser.on('cdata', (text: string) => handleText(state, text));
    parser.on('error', (error: Error) => {
      stream.destroy();
      reject(new ValidationError(`Malformed JUnit XML in ${source}: ${error.message.split('\n')[0] ?? error.message}`));
    });
    parser.on('end', () => {
      resolve({
        results: state.results,
        suites: state.suiteCount,
        warnings: state.warnings,
      });
    });

    stream.on('error', (error: Error) => reject(error));
    stream.pipe(parser);
  });
}

export function parseJUnitString(xml: string, source = '<string>'): Promise<ParsedReport> {
  return parseJUnitStream(Readable.from([xml]), source);
}

export function parseJUnitFile(path: string): Promise<ParsedReport> {
  return parseJUnitStream(createReadStream(path, { encoding: 'utf-8' }), path);
}
