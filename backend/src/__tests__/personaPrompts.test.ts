import { describe, it, expect } from 'vitest';
import { buildInstruction, buildOpeningPrompt, speakerLabel } from '../agents/personaPrompts.js';
import { createTemplateEnvironment } from '../templates.js';
import type { CharacterProfile } from '../types/Character.js';

const buyer: CharacterProfile = {
  name: 'Asha Rao',
  profession: 'procurement lead',
  background: 'representing CyberCorp',
  mood: 'impatient',
  behavior: 'direct and data-driven',
  objective: 'cut the licence price by 20%',
  strengths: 'three competing quotes',
  model_name: 'gemini-1.5-flash'
};

const seller: CharacterProfile = {
  name: 'Bram Vos',
  profession: 'account executive',
  background: 'from Rotterdam',
  mood: 'confident',
  behavior: 'warm but stubborn',
  objective: 'keep the discount under 5%',
  strengths: 'switching costs',
  model_name: 'gemini-1.5-pro'
};

describe('buildInstruction', () => {
  it('opens with the identity framing', () => {
    const instruction = buildInstruction(buyer);
    expect(instruction.split('\n')[0]).toBe('You are Asha Rao (representing CyberCorp), a procurement lead.');
  });

  it('substitutes every persona field verbatim', () => {
    const instruction = buildInstruction(seller);
    for (const value of [seller.name, seller.profession, seller.background, seller.mood, seller.behavior, seller.objective, seller.strengths]) {
      expect(instruction).toContain(value);
    }
  });

  it('states the objective, the strengths and a brevity limit on their own lines', () => {
    const lines = buildInstruction(buyer).split('\n');
    expect(lines).toContain('Your primary objective in this negotiation: cut the licence price by 20%.');
    expect(lines).toContain('Lean on your key strengths to get there: three competing quotes.');
    expect(lines).toContain('Keep every reply concise and impactful: no more than 2-3 lines.');
  });

  it('leaves the model name out and is deterministic', () => {
    const first = buildInstruction(buyer);
    expect(first).not.toContain('gemini');
    expect(buildInstruction({ ...buyer })).toBe(first);
  });

  it('does not escape markup characters in profile values', () => {
    const instruction = buildInstruction({ ...buyer, strengths: '<loyalty> & "volume"' });
    expect(instruction).toContain('Lean on your key strengths to get there: <loyalty> & "volume".');
  });
});

describe('buildOpeningPrompt', () => {
  it('asks speaker 1 to open towards speaker 2 on the topic', () => {
    expect(buildOpeningPrompt(buyer, seller, 'cloud contract renewal')).toBe(
      "As Asha Rao, make your opening statement to Bram Vos regarding the negotiation on 'cloud contract renewal'.\n" +
        "Clearly state your initial position based on your objective: 'cut the licence price by 20%'."
    );
  });
});

describe('speakerLabel', () => {
  it('combines name and background', () => {
    expect(speakerLabel(seller)).toBe('Bram Vos (from Rotterdam)');
  });
});

describe('createTemplateEnvironment', () => {
  it('registers no custom filters', () => {
    expect(() => createTemplateEnvironment().getFilter('json')).toThrow();
  });
});
