import { parseCsv, formatCsv, splitCsvLine, normalizeHeader } from './csv';

describe('csv', () => {
  it('should normalize headers', () => {
    expect(normalizeHeader(' Home Team ')).toBe('home_team');
    expect(normalizeHeader('Away  Pts')).toBe('away_pts');
  });

  it('should split quoted fields', () => {
    expect(splitCsvLine('a,"b, c","say ""hi"""')).toEqual(['a', 'b, c', 'say "hi"']);
  });

  it('should parse rows keyed by normalized headers', () => {
    const rows = parseCsv('Date,Home Team,Away Team\r\n2024-12-01, Chiefs ,Bengals\n\n');
    expect(rows).toEqual([{ date: '2024-12-01', home_team: 'Chiefs', away_team: 'Bengals' }]);
  });

  it('should fill missing trailing fields with empty strings', () => {
    expect(parseCsv('a,b,c\n1,2\n')).toEqual([{ a: '1', b: '2', c: '' }]);
  });

  it('should return no rows for empty text', () => {
    expect(parseCsv('')).toEqual([]);
  });

  it('should format rows in header order', () => {
    const text = formatCsv(['game_id', 'market'], [{ market: 'ML', game_id: 'G1' }, { game_id: 'G,2' }]);
    expect(text).toBe('game_id,market\nG1,ML\n"G,2",\n');
  });
});
