import { createEntity, createGroupKey, scalar } from '../../../domain/factories';
import { buildShopSnapshot, TYPES } from '../../../test/fixtures/snapshots/shopSnapshot';
import { buildUsersSnapshot } from '../../../test/fixtures/snapshots/usersSnapshot';
import { renderGroupSection, renderSnapshot, renderTypeListing, sortGroupKeys } from '../renderSnapshot';

describe('renderSnapshot', () => {
  it('renders the single-catalog example with the self-reference dropped', () => {
    expect(renderSnapshot(buildUsersSnapshot(), 1)).toBe(
      [
        'Database snapshot for jdbc:test://localhost/app',
        '-----------------------------------------------------------------',
        'Database type: TestDB',
        'Database version: 1.0',
        'Database user: tester',
        'Included types:',
        '    Catalog',
        '    Column',
        '    Schema',
        '    Table',
        '',
        'Catalog: public',
        '    Table:',
        '        users',
        '            columns:',
        '                colA',
        '                colB',
        ''
      ].join('\n')
    );
  });

  it('lists groups by label and eligible types in order, skipping ungrouped and foreign entities', () => {
    expect(renderSnapshot(buildShopSnapshot(), 1)).toBe(
      [
        'Database snapshot for jdbc:test://db.example/shop',
        '-----------------------------------------------------------------',
        'Database type: TestDB',
        'Database version: 2.1',
        'Database user: reporter',
        'Included types:',
        '    Catalog',
        '    Column',
        '    Schema',
        '    Table',
        '    View',
        '',
        'Catalog & Schema: shop / audit',
        '    Table:',
        '        log',
        '            remarks: Audit trail',
        '',
        'Catalog & Schema: shop / sales',
        '    Table:',
        '        customers',
        '        orders',
        '            columns:',
        '                id',
        '                    nullable: false',
        '                    type: INT',
        '                total',
        '                    type: DECIMAL(10,2)',
        '            primaryKey: pk_orders',
        '                columns:',
        '                    id',
        '                        nullable: false',
        '                        type: INT',
        '            remarks: Customer orders',
        '            rowCount: 42',
        '            tags: core, billing',
        '',
        '    View:',
        '        active_orders',
        '            base: orders',
        '                columns:',
        '                    id',
        '                        nullable: false',
        '                        type: INT',
        '                    total',
        '                        type: DECIMAL(10,2)',
        '                primaryKey: pk_orders',
        '                    columns: id',
        '                remarks: Customer orders',
        '                rowCount: 42',
        '                tags: core, billing',
        '            definition: select * from orders',
        ''
      ].join('\n')
    );
  });

  it('uses the catalog alone as the label without two-level grouping', () => {
    const snapshot = buildShopSnapshot();
    snapshot.supportsTwoLevelGrouping = false;
    snapshot.groupingKeys = [createGroupKey('zeta'), createGroupKey('alpha')];

    expect(sortGroupKeys(snapshot).map((k) => k.catalog)).toEqual(['alpha', 'zeta']);
    const text = renderSnapshot(snapshot, 1);
    expect(text.endsWith('\nCatalog: alpha\n\nCatalog: zeta\n')).toBe(true);
  });

  it('normalizes newlines coming from provider strings', () => {
    const snapshot = buildUsersSnapshot();
    snapshot.source.user = 'line1\r\nline2\rline3';

    const lines = renderSnapshot(snapshot, 1).split('\n');
    expect(lines.slice(4, 7)).toEqual(['Database user: line1', 'line2', 'line3']);
    expect(renderSnapshot(snapshot, 1)).not.toMatch(/\r/);
  });

  it('returns null for an empty type listing and joins listings with a blank line', () => {
    expect(renderTypeListing(TYPES.table, [], { expandDepth: 1 })).toBeNull();

    const snapshot = buildShopSnapshot();
    const audit = createGroupKey('shop', 'audit');
    snapshot.entities.View = [createEntity({ type: TYPES.view, name: 'v', group: audit, attributes: { n: scalar(1) } })];

    expect(renderGroupSection(snapshot, audit, { expandDepth: 1 })).toBe(
      ['Table:', '    log', '        remarks: Audit trail', '', 'View:', '    v', '        n: 1'].join('\n')
    );
  });

  it('prints a group header even when the group owns nothing', () => {
    const snapshot = buildUsersSnapshot();
    snapshot.groupingKeys.push(createGroupKey('empty'));

    expect(renderSnapshot(snapshot, 1).split('\n').slice(10, 13)).toEqual(['', 'Catalog: empty', '']);
  });
});
