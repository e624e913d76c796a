import { getMetadataArgsStorage } from 'typeorm';
import { GitContribution } from './git-contribution.entity';

function columnOptions(propertyName: string) {
  const column = getMetadataArgsStorage().columns.find(
    (candidate) => candidate.target === GitContribution && candidate.propertyName === propertyName,
  );
  if (!column) throw new Error(`no column metadata for ${propertyName}`);
  return column.options;
}

describe('GitContribution columns', () => {
  it.each(['commit_hash', 'branch', 'commit_url'])('stores %s without a length limit', (name) => {
    const options = columnOptions(name);
    expect(options.type).toBe('text');
    expect(options.length).toBeUndefined();
  });
});
