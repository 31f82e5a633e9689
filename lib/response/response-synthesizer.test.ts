import { describe, expect, it } from 'vitest';
import { ScriptedAIAdapter, housingContext, housingProfile, silentLogger } from '@/test/helpers';
import { ModelUnavailableError } from '../errors';
import type { QuerySuccess } from '../query/query-executor';
import type { ToolCall } from '../tools/tool-call';
import {
  CANNOT_ANSWER_REPLY,
  DATABASE_ERROR_REPLY,
  NO_ROWS_REPLY,
  ResponseSynthesizer,
  cleanReply,
  formatResult,
} from './response-synthesizer';

const context = housingContext();

const AVERAGE_BY_PROXIMITY: ToolCall = {
  tool: 'aggregate_stats',
  params: { groupBy: 'ocean_proximity', targetCol: 'median_house_value', aggType: 'AVG' },
};

const AVERAGE_RESULT: QuerySuccess = {
  ok: true,
  tool: 'aggregate_stats',
  rows: [
    { ocean_proximity: 'ISLAND', value: 417000 },
    { ocean_proximity: 'NEAR BAY', value: 385666.6666666667 },
  ],
  count: 2,
  parameters: { group_by: 'ocean_proximity', target_col: 'median_house_value', agg_type: 'AVG' },
};

const TOP_ROW_RESULT: QuerySuccess = {
  ok: true,
  tool: 'search_rows',
  rows: [{ median_house_value: 447000, ocean_proximity: 'NEAR BAY', median_income: 8.1 }],
  count: 1,
  parameters: { sort_by: 'median_house_value', sort_order: 'DESC', limit: 1 },
};

const TOP_ROW_CALL: ToolCall = {
  tool: 'search_rows',
  params: { filters: {}, sortBy: 'median_house_value', sortOrder: 'DESC', limit: 1 },
};

function synthesizerFor(ai: ScriptedAIAdapter): ResponseSynthesizer {
  return new ResponseSynthesizer(ai, housingProfile(), silentLogger());
}

describe('response/response-synthesizer', () => {
  describe('cleanReply', () => {
    it('should strip emphasis and bullets and collapse whitespace', () => {
      expect(cleanReply('**Top** result:\n- One\n- Two  ')).toBe('Top result: One Two');
    });
  });

  describe('formatResult', () => {
    it('should format monetary aggregates as dollars', () => {
      expect(formatResult(AVERAGE_RESULT, context)).toBe(
        'AVG of median_house_value by ocean_proximity:\n- ISLAND: $417,000\n- NEAR BAY: $385,666.67',
      );
    });

    it('should not format counts as money', () => {
      const counts: QuerySuccess = {
        ...AVERAGE_RESULT,
        rows: [{ ocean_proximity: 'INLAND', value: 3 }],
        count: 1,
        parameters: { group_by: 'ocean_proximity', target_col: 'median_house_value', agg_type: 'COUNT' },
      };

      expect(formatResult(counts, context)).toBe('COUNT of median_house_value by ocean_proximity:\n- INLAND: 3');
    });

    it('should number search rows', () => {
      expect(formatResult(TOP_ROW_RESULT, context)).toBe(
        'Found 1 row:\n1. median_house_value: $447,000, ocean_proximity: NEAR BAY, median_income: 8.10',
      );
    });

    it('should list definitions', () => {
      const lookup: QuerySuccess = {
        ok: true,
        tool: 'lookup_definition',
        rows: [
          { term: 'median_income', kind: 'column', description: 'Median household income' },
          { term: 'Location', kind: 'group', columns: 'longitude, latitude' },
        ],
        count: 2,
        parameters: { term: null },
      };

      expect(formatResult(lookup, context)).toBe('median_income: Median household income\nLocation: longitude, latitude');
    });
  });

  describe('synthesize', () => {
    it('should answer fixed sentences for failures and empty results', async () => {
      const ai = new ScriptedAIAdapter();
      const synthesizer = synthesizerFor(ai);
      const base = { utterance: 'Average by proximity', history: [], call: AVERAGE_BY_PROXIMITY };

      expect(
        await synthesizer.synthesize(
          { ...base, result: { ok: false, tool: 'aggregate_stats', error: 'invalid_parameters', detail: 'bad column' } },
          context,
        ),
      ).toBe(CANNOT_ANSWER_REPLY);
      expect(
        await synthesizer.synthesize(
          { ...base, result: { ok: false, tool: 'aggregate_stats', error: 'database_error', detail: 'locked' } },
          context,
        ),
      ).toBe(DATABASE_ERROR_REPLY);
      expect(await synthesizer.synthesize({ ...base, result: { ...AVERAGE_RESULT, rows: [], count: 0 } }, context)).toBe(
        NO_ROWS_REPLY,
      );
      expect(ai.calls).toHaveLength(0);
    });

    it('should say when a term has no definition', async () => {
      const reply = await synthesizerFor(new ScriptedAIAdapter()).synthesize({
        utterance: 'What is zoning?',
        history: [],
        call: { tool: 'lookup_definition', params: { term: 'zoning' } },
        result: { ok: true, tool: 'lookup_definition', rows: [], count: 0, parameters: { term: 'zoning' } },
      });

      expect(reply).toBe('I don\'t have a definition for "zoning".');
    });

    it('should build a chart without calling the model', async () => {
      const ai = new ScriptedAIAdapter();

      const reply = await synthesizerFor(ai).synthesize(
        {
          utterance: 'Plot average house price by ocean proximity',
          history: [],
          call: AVERAGE_BY_PROXIMITY,
          result: AVERAGE_RESULT,
        },
        context,
      );

      expect(reply).toMatchObject({
        mark: 'bar',
        encoding: { x: { field: 'ocean_proximity' }, y: { field: 'value' } },
        data: { values: AVERAGE_RESULT.rows },
      });
      expect(ai.calls).toHaveLength(0);
    });

    it('should summarize rows through the model and clean the reply', async () => {
      const ai = new ScriptedAIAdapter(['The **priciest** block is worth $447,000.\n']);

      const reply = await synthesizerFor(ai).synthesize(
        { utterance: 'Most expensive block?', history: [], call: TOP_ROW_CALL, result: TOP_ROW_RESULT },
        context,
        'req-7',
      );

      expect(reply).toBe('The priciest block is worth $447,000.');
      const [call] = ai.calls;
      expect(call.options).toEqual({ temperature: 0.2, requestId: 'req-7' });
      expect(call.messages[0].content).toContain(
        'Format median_house_value, aggregated value of those columns as US dollars (e.g. $452,600).',
      );
      expect(call.messages[0].content).toContain('Results (1 rows):');
      expect(call.messages[1]).toEqual({ role: 'user', content: 'Most expensive block?' });
    });

    it('should fall back to formatted rows when the model fails', async () => {
      const ai = new ScriptedAIAdapter([new ModelUnavailableError('Model call failed')]);

      const reply = await synthesizerFor(ai).synthesize(
        { utterance: 'Average by proximity', history: [], call: AVERAGE_BY_PROXIMITY, result: AVERAGE_RESULT },
        context,
      );

      expect(reply).toBe('AVG of median_house_value by ocean_proximity:\n- ISLAND: $417,000\n- NEAR BAY: $385,666.67');
    });

    it('should return the model\'s own prose for a conversational turn', async () => {
      const ai = new ScriptedAIAdapter();

      const reply = await synthesizerFor(ai).synthesize({
        utterance: 'Hi',
        history: [],
        resolution: { kind: 'no_tool', reason: 'conversational', reply: '**Hello!** Ask me about housing.' },
      });

      expect(reply).toBe('Hello! Ask me about housing.');
      expect(ai.calls).toHaveLength(0);
    });

    it('should redirect through the model when there is no prose', async () => {
      const ai = new ScriptedAIAdapter(['I can help with California housing questions, like average values by area.']);

      const reply = await synthesizerFor(ai).synthesize({
        utterance: 'Tell me a joke',
        history: [{ role: 'user', content: 'Hi' }],
        resolution: { kind: 'no_tool', reason: 'malformed_output', detail: '{' },
      });

      expect(reply).toBe('I can help with California housing questions, like average values by area.');
      const [call] = ai.calls;
      expect(call.messages[0].content).toContain('You help users explore California Housing data.');
      expect(call.messages.slice(1)).toEqual([
        { role: 'user', content: 'Hi' },
        { role: 'user', content: 'Tell me a joke' },
      ]);
    });

    it('should suggest the profile\'s example questions first', async () => {
      const ai = new ScriptedAIAdapter(['Try asking about prices by area.']);
      const synthesizer = new ResponseSynthesizer(
        ai,
        housingProfile({
          exampleQuestions: ['Which area is most expensive?', 'Average income inland?', 'Oldest blocks?', 'Unused?'],
          queryExamples: [{ question: 'Top 5 by value', tool: 'search_rows', parameters: {} }],
        }),
        silentLogger(),
      );

      await synthesizer.synthesize({
        utterance: 'Tell me a joke',
        history: [],
        resolution: { kind: 'no_tool', reason: 'malformed_output', detail: '{' },
      });

      expect(ai.calls[0].messages[0].content).toContain(
        'Questions you can answer:\n- Which area is most expensive?\n- Average income inland?\n- Oldest blocks?',
      );
      expect(ai.calls[0].messages[0].content).not.toContain('Unused?');
    });

    it('should fall back to the query examples for suggestions', async () => {
      const ai = new ScriptedAIAdapter(['Try asking about prices by area.']);
      const synthesizer = new ResponseSynthesizer(
        ai,
        housingProfile({ queryExamples: [{ question: 'Top 5 by value', tool: 'search_rows', parameters: {} }] }),
        silentLogger(),
      );

      await synthesizer.synthesize({
        utterance: 'Tell me a joke',
        history: [],
        resolution: { kind: 'no_tool', reason: 'malformed_output', detail: '{' },
      });

      expect(ai.calls[0].messages[0].content).toContain('Questions you can answer:\n- Top 5 by value');
    });

    it('should mention an unavailable dataset to the model', async () => {
      const ai = new ScriptedAIAdapter(['The data is offline right now.']);

      await synthesizerFor(ai).synthesize({
        utterance: 'Average price?',
        history: [],
        resolution: { kind: 'no_tool', reason: 'data_unavailable', detail: 'no such file' },
      });

      expect(ai.calls[0].messages[0].content).toContain(
        'The dataset cannot be reached right now; say so if the user asks for data.',
      );
    });

    it('should use a fixed redirect when the model cannot be reached', async () => {
      const ai = new ScriptedAIAdapter([new ModelUnavailableError('Model call failed')]);

      const reply = await synthesizerFor(ai).synthesize({
        utterance: 'Tell me a joke',
        history: [],
        resolution: { kind: 'no_tool', reason: 'unknown_tool', detail: 'Unknown tool "joke"' },
      });

      expect(reply).toBe(
        'I can only help with questions about California Housing data. ' +
          'Try asking about specific values, rankings or averages in the dataset.',
      );
    });
  });
});
