import {
  classifyHeuristic,
  classifyIntent,
  extractTopic,
  isFollowupToken,
  parseIntentOutput,
  parseItemReference,
} from '../../search/intent-detector';
import { FakeGenerator } from '../helpers/fakes';

const noList = { hasCachedList: false };
const withList = { hasCachedList: true };

describe('classifyHeuristic', () => {
  it('treats a short greeting as chat', () => {
    const result = classifyHeuristic('hey there', noList);
    expect(result.intent).toEqual({ kind: 'chat' });
    expect(result.method).toBe('heuristic');
  });

  it('lets a news keyword win over a greeting', () => {
    const result = classifyHeuristic('hi, any news on spacex?', noList);
    expect(result.intent).toEqual({ kind: 'news', topic: 'spacex', category: 'space' });
  });

  it('extracts topic and category from a news request', () => {
    const result = classifyHeuristic('latest nasa news', noList);
    expect(result.intent).toEqual({ kind: 'news', topic: 'nasa', category: 'space' });
    expect(result.topic).toBe('nasa');
  });

  it('classifies a bare category keyword as news', () => {
    const result = classifyHeuristic('cricket', noList);
    expect(result.intent).toEqual({ kind: 'news', topic: 'cricket', category: 'sports' });
  });

  it('matches keywords on word boundaries', () => {
    expect(classifyHeuristic('it might rain tomorrow', noList).intent).toEqual({ kind: 'chat' });
    expect(classifyHeuristic('renewal of my lease', noList).intent).toEqual({ kind: 'chat' });
  });

  it('treats continuation tokens as follow-ups only with a cached list', () => {
    expect(classifyHeuristic('yes', withList).intent).toEqual({ kind: 'followup', itemNumber: null });
    expect(classifyHeuristic('Tell me more!', withList).intent).toEqual({ kind: 'followup', itemNumber: null });
    expect(classifyHeuristic('yes', noList).intent).toEqual({ kind: 'chat' });
  });

  it('carries the item number of a bare integer', () => {
    expect(classifyHeuristic('2', withList).intent).toEqual({ kind: 'followup', itemNumber: 2 });
    expect(classifyHeuristic('tell me more about 3', withList).intent).toEqual({ kind: 'followup', itemNumber: 3 });
  });

  it('falls back to chat', () => {
    expect(classifyHeuristic('what is the meaning of life', noList).intent).toEqual({ kind: 'chat' });
  });
});

describe('topic and token helpers', () => {
  it('strips request phrasing from topics', () => {
    expect(extractTopic('Give me the latest updates on Apple')).toBe('apple');
    expect(extractTopic("what's new with the moon?")).toBe('moon');
  });

  it('keeps connective words inside a topic', () => {
    expect(extractTopic('new york news')).toBe('new york');
    expect(extractTopic('news on the state of the union')).toBe('state of the union');
    expect(classifyHeuristic('new york news', noList).intent).toEqual({ kind: 'news', topic: 'new york', category: null });
  });

  it('parses item references', () => {
    expect(parseItemReference('1')).toBe(1);
    expect(parseItemReference('#4')).toBe(4);
    expect(parseItemReference('item 2.')).toBe(2);
    expect(parseItemReference('2 cats')).toBeNull();
  });

  it('recognizes follow-up tokens', () => {
    expect(isFollowupToken('Okay.')).toBe(true);
    expect(isFollowupToken('go on')).toBe(true);
    expect(isFollowupToken('yes but about tech')).toBe(false);
  });
});

describe('parseIntentOutput', () => {
  it('reads fenced JSON', () => {
    const raw = '```json\n{"intent":"news","topic":"James Webb telescope","category":"space","confidence":0.9,"reasoning":"asks for news"}\n```';
    expect(parseIntentOutput(raw, 'jwst news')).toEqual({
      intent: { kind: 'news', topic: 'james webb telescope', category: 'space' },
      topic: 'james webb telescope',
      confidence: 0.9,
      reasoning: 'asks for news',
      method: 'llm',
    });
  });

  it('rejects unknown intents and out-of-range confidence', () => {
    expect(parseIntentOutput('{"intent":"weather","confidence":0.5}', 'x')).toBeNull();
    expect(parseIntentOutput('{"intent":"chat","confidence":1.5}', 'x')).toBeNull();
    expect(parseIntentOutput('not json at all', 'x')).toBeNull();
  });

  it('maps an unknown category through the keyword table', () => {
    const result = parseIntentOutput('{"intent":"news","topic":"netflix","category":"streaming","confidence":0.8}', 'netflix news');
    expect(result?.intent).toEqual({ kind: 'news', topic: 'netflix', category: 'entertainment' });
  });
});

describe('classifyIntent', () => {
  it('uses the heuristic without a generator', async () => {
    const result = await classifyIntent('latest nasa news', noList);
    expect(result.method).toBe('heuristic');
    expect(result.intent).toEqual({ kind: 'news', topic: 'nasa', category: 'space' });
  });

  it('uses the model verdict when it is valid', async () => {
    const generator = new FakeGenerator(() => '{"intent":"news","topic":"football","category":"sports","confidence":0.8,"reasoning":"sports question"}');
    const result = await classifyIntent('how did arsenal do', noList, generator);

    expect(generator.prompts).toHaveLength(1);
    expect(result.method).toBe('llm');
    expect(result.intent).toEqual({ kind: 'news', topic: 'football', category: 'sports' });
  });

  it('resolves a follow-up token with a cached list without calling the model', async () => {
    const generator = new FakeGenerator(() => '{"intent":"chat","confidence":0.9}');
    const result = await classifyIntent('yes', withList, generator);

    expect(generator.prompts).toHaveLength(0);
    expect(result.intent).toEqual({ kind: 'followup', itemNumber: null });
  });

  it('falls back to the heuristic on malformed output', async () => {
    const generator = new FakeGenerator(() => 'I think this is news');
    const result = await classifyIntent('latest nasa news', noList, generator);
    expect(result.method).toBe('heuristic');
    expect(result.intent.kind).toBe('news');
  });

  it('falls back when the model picks followup without a cached list', async () => {
    const generator = new FakeGenerator(() => '{"intent":"followup","itemNumber":1,"confidence":0.9}');
    const result = await classifyIntent('hello friend', noList, generator);
    expect(result.method).toBe('heuristic');
    expect(result.intent).toEqual({ kind: 'chat' });
  });

  it('falls back when the model throws', async () => {
    const generator = new FakeGenerator(() => new Error('quota exceeded'));
    const result = await classifyIntent('tech updates', noList, generator);
    expect(result.method).toBe('heuristic');
    expect(result.intent).toEqual({ kind: 'news', topic: 'tech', category: 'tech' });
  });
});
