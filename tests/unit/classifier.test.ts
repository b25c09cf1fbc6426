import { describe, it, expect } from 'vitest';
import { classify, scoreCategories, foldCase, CATEGORY_KEYWORDS } from '../../src/memory/classifier.js';

describe('scoreCategories', () => {
  it('counts keywords per category', () => {
    expect(scoreCategories('Reunião de trabalho com cliente sobre o projeto')).toEqual({
      personal: 0,
      professional: 4,
      technical: 0,
    });
  });

  it('counts each keyword once no matter how often it appears', () => {
    expect(scoreCategories('casa casa casa').personal).toBe(1);
  });

  it('matches substrings inside other words', () => {
    // "api" inside "rapidez", "vida" inside "dúvida"
    expect(scoreCategories('rapidez sem dúvida')).toEqual({
      personal: 1,
      professional: 0,
      technical: 1,
    });
  });

  it('ignores case', () => {
    expect(scoreCategories('FAMÍLIA e AMIGO').personal).toBe(2);
  });

  it('matches decomposed accents against precomposed keywords', () => {
    const decomposed = 'reuni\u0061\u0303o';
    expect(scoreCategories(decomposed).professional).toBe(1);
  });
});

describe('classify', () => {
  it('picks professional for a work meeting', () => {
    expect(classify('Reunião de trabalho com cliente sobre o projeto')).toBe('professional');
  });

  it('picks personal for family at home', () => {
    expect(classify('Minha família foi para casa hoje')).toBe('personal');
  });

  it('picks technical for code talk', () => {
    expect(classify('Encontrei um bug no código do servidor')).toBe('technical');
  });

  it('falls back to general when nothing matches', () => {
    expect(classify('O clima está bom hoje')).toBe('general');
    expect(classify('')).toBe('general');
  });

  it('takes the strictly highest score', () => {
    // personal 1 (casa), technical 2 (software, bug)
    expect(classify('software com bug em casa')).toBe('technical');
  });

  describe('ties', () => {
    it('prefers personal over professional', () => {
      expect(classify('amigo da empresa')).toBe('personal');
    });

    it('prefers professional over technical', () => {
      expect(classify('cliente do software')).toBe('professional');
    });

    it('prefers personal over technical', () => {
      expect(classify('hobby: database')).toBe('personal');
    });

    it('prefers personal when all three tie', () => {
      expect(classify('vida, carreira e algoritmo')).toBe('personal');
    });
  });

  it('is deterministic', () => {
    const text = 'Projeto de software para a empresa';
    const first = classify(text);
    for (let i = 0; i < 5; i++) {
      expect(classify(text)).toBe(first);
    }
  });
});

describe('keyword tables', () => {
  it('are already in folded form', () => {
    for (const keywords of Object.values(CATEGORY_KEYWORDS)) {
      for (const keyword of keywords) {
        expect(foldCase(keyword)).toBe(keyword);
      }
    }
  });
});
