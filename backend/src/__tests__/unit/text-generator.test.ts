import {
  ChatCompletionsClient,
  ChatModelLike,
  LangChainTextGenerator,
  OpenAIChatTextGenerator,
  contentToText,
} from '../../agents/text-generator';

describe('contentToText', () => {
  it('flattens strings and content parts', () => {
    expect(contentToText('plain')).toBe('plain');
    expect(contentToText(['a', { type: 'text', text: 'b' }, { type: 'image_url' }, 3])).toBe('ab');
    expect(contentToText(undefined)).toBe('');
  });
});

describe('LangChainTextGenerator', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('returns trimmed model text', async () => {
    const invoke = jest.fn(async (_input: string) => ({ content: '  A summary.  ' }));
    const llm: ChatModelLike = { invoke };
    const generator = new LangChainTextGenerator(llm, 'test-model');

    expect(await generator.generate('prompt')).toBe('A summary.');
    expect(invoke).toHaveBeenCalledWith('prompt');
    expect(generator.model).toBe('test-model');
  });

  it('resolves null for empty output and errors', async () => {
    const empty = new LangChainTextGenerator({ invoke: async () => ({ content: '   ' }) }, 'm');
    const failing = new LangChainTextGenerator(
      {
        invoke: async () => {
          throw new Error('401 unauthorized');
        },
      },
      'm'
    );

    expect(await empty.generate('p')).toBeNull();
    expect(await failing.generate('p')).toBeNull();
    expect(errorSpy).toHaveBeenCalledWith('LLM call failed:', '401 unauthorized');
  });
});

describe('OpenAIChatTextGenerator', () => {
  function client(create: ChatCompletionsClient['chat']['completions']['create']): ChatCompletionsClient {
    return { chat: { completions: { create } } };
  }

  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('sends one user message with the configured sampling options', async () => {
    const create = jest.fn(async () => ({ choices: [{ message: { content: ' Result ' } }] }));
    const generator = new OpenAIChatTextGenerator(client(create), 'gpt-test', { temperature: 0.5, maxTokens: 100 });

    expect(await generator.generate('hello')).toBe('Result');
    expect(create).toHaveBeenCalledWith({
      model: 'gpt-test',
      messages: [{ role: 'user', content: 'hello' }],
      temperature: 0.5,
      max_tokens: 100,
    });
  });

  it('uses default sampling options', async () => {
    const create = jest.fn(async () => ({ choices: [{ message: { content: 'x' } }] }));
    await new OpenAIChatTextGenerator(client(create), 'gpt-test').generate('p');

    expect(create).toHaveBeenCalledWith(expect.objectContaining({ temperature: 0.2, max_tokens: 700 }));
  });

  it('resolves null for missing choices and errors', async () => {
    const noChoices = new OpenAIChatTextGenerator(client(async () => ({ choices: [] })), 'm');
    const nullContent = new OpenAIChatTextGenerator(
      client(async () => ({ choices: [{ message: { content: null } }] })),
      'm'
    );
    const failing = new OpenAIChatTextGenerator(
      client(async () => {
        throw new Error('timeout');
      }),
      'm'
    );

    expect(await noChoices.generate('p')).toBeNull();
    expect(await nullContent.generate('p')).toBeNull();
    expect(await failing.generate('p')).toBeNull();
  });
});
