import { describe, it, expect } from 'vitest';
import { IntentClassifier, countWords, parseKeywordTables } from '../intent.js';
import { createQuestion } from '../../types/models.js';

const classifier = new IntentClassifier();

function classify(text: string) {
  return classifier.classify(createQuestion(text, 1));
}

describe('IntentClassifier', () => {
  it.each([
    ['How can you help me?', 'HelpRequest'],
    ['Tell me a joke', 'OffTopic'],
    ['What are the 10 orders with the highest value?', 'DatabaseQuery'],
    ['show me sales this month', 'DatabaseQuery'],
    ['What tables are in the database?', 'DatabaseQuery'],
    ["What's the weather like today?", 'OffTopic'],
  ] as const)('classifies %j as %s', (text, kind) => {
    expect(classify(text).kind).toBe(kind);
  });

  it('counts matched phrases per category', () => {
    expect(classifier.score('What are the 10 orders with the highest value?')).toEqual({
      database: 3,
      help: 0,
      offTopic: 0,
    });
  });

  it('prefers database intent when off-topic cues also appear', () => {
    const result = classify('which movie product had the most sales');
    expect(result.kind).toBe('DatabaseQuery');
    expect(result.basis).toBe('keywords');
  });

  it('prefers database intent when it outweighs a help phrase', () => {
    const result = classify('help me list the customers');
    expect(result.scores.help).toBe(1);
    expect(result.scores.database).toBe(2);
    expect(result.kind).toBe('DatabaseQuery');
  });

  it('treats long unmatched questions as data requests', () => {
    const result = classify('Could you please tell me something interesting about Paris?');
    expect(result.kind).toBe('DatabaseQuery');
    expect(result.basis).toBe('long-question-default');
  });

  it('treats short unmatched questions as off topic', () => {
    const result = classify('Nice to meet you');
    expect(result.kind).toBe('OffTopic');
    expect(result.basis).toBe('short-question-default');
  });

  it('honours a configured long-question threshold', () => {
    const strict = new IntentClassifier({ longQuestionWords: 3 });
    expect(strict.classify(createQuestion('Nice to meet you', 1)).basis).toBe(
      'long-question-default'
    );
  });

  it('keeps the question on the result', () => {
    const question = createQuestion('Tell me a joke', 4);
    expect(classifier.classify(question).question).toBe(question);
  });

  it('accepts custom keyword tables', () => {
    const custom = new IntentClassifier({
      keywords: parseKeywordTables({
        database: ['Widget', 'widget'],
        help: ['assist'],
        offTopic: ['sunny'],
      }),
    });

    expect(custom.score('Widgets please')).toEqual({ database: 1, help: 0, offTopic: 0 });
    expect(custom.classify(createQuestion('is it sunny', 1)).kind).toBe('OffTopic');
    expect(custom.classify(createQuestion('assist me', 1)).kind).toBe('HelpRequest');
  });
});

describe('parseKeywordTables', () => {
  it('lowercases and de-duplicates phrases', () => {
    const tables = parseKeywordTables({
      database: ['Total', 'total', ' TOTAL '],
      help: ['Help'],
      offTopic: [],
    });
    expect(tables.database).toEqual(['total']);
    expect(tables.help).toEqual(['help']);
  });

  it('rejects a missing category', () => {
    expect(() => parseKeywordTables({ database: ['x'], help: [] })).toThrow();
  });
});

describe('countWords', () => {
  it('ignores repeated whitespace', () => {
    expect(countWords('  how   many\torders \n')).toBe(3);
    expect(countWords('')).toBe(0);
  });
});
