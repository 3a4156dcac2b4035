import { describe, it, expect } from 'vitest';
import { extractSignificantWords, matchCategory, sortCategoriesById } from '../src/services/category/matcher';

const named = (...names: string[]) => names.map((name, index) => ({ id: index + 1, name }));

describe('Category Matcher', () => {
  it('should prefer the shortest category containing the hint', () => {
    const categories = named('Food - Dining Out', 'Food - Grocery');
    expect(matchCategory('food', categories)?.name).toBe('Food - Grocery');
  });

  it('should return an exact match over containing ones', () => {
    const categories = named('Food', 'Food - Dining', 'Food - Dining Out');
    expect(matchCategory('Food - Dining Out', categories)?.name).toBe('Food - Dining Out');
    expect(matchCategory('FOOD', categories)?.name).toBe('Food');
  });

  it('should keep input order on ties', () => {
    const categories = named('Food A', 'Food B');
    expect(matchCategory('food', categories)?.id).toBe(1);
    expect(matchCategory('food', [...categories].reverse())?.id).toBe(2);
  });

  it('should fall back to the longest name contained in the hint', () => {
    const categories = named('Out', 'Dining Out');
    expect(matchCategory('Food - Dining Out expenses', categories)?.name).toBe('Dining Out');
  });

  it('should fall back to a shared significant word', () => {
    const categories = named('Bills & Utilities', 'Health & Fitness');
    expect(matchCategory('fitness gym', categories)?.name).toBe('Health & Fitness');
  });

  it('should ignore stop words when comparing words', () => {
    const categories = named('Gifts and Donations');
    expect(matchCategory('and the for', categories)).toBeNull();
  });

  it('should return null for blank hints and empty lists', () => {
    expect(matchCategory('   ', named('Other'))).toBeNull();
    expect(matchCategory('food', [])).toBeNull();
    expect(matchCategory('xyz', named('Other'))).toBeNull();
  });

  it('should give the same answer for the same input', () => {
    const categories = named('Food - Dining Out', 'Food - Grocery', 'Transportation');
    expect(matchCategory('grocery run', categories)).toBe(matchCategory('grocery run', categories));
  });

  describe('extractSignificantWords', () => {
    it('should split on separators and drop short words', () => {
      expect(extractSignificantWords('Food - Dining Out')).toEqual(['food', 'dining', 'out']);
      expect(extractSignificantWords('Gifts & Donations for the team')).toEqual(['gifts', 'donations', 'team']);
      expect(extractSignificantWords('Bus/MRT to go')).toEqual(['bus', 'mrt']);
    });
  });

  describe('sortCategoriesById', () => {
    it('should return a sorted copy', () => {
      const categories = [
        { id: 3, name: 'C' },
        { id: 1, name: 'A' },
        { id: 2, name: 'B' },
      ];
      expect(sortCategoriesById(categories).map((c) => c.id)).toEqual([1, 2, 3]);
      expect(categories[0].id).toBe(3);
    });
  });
});
