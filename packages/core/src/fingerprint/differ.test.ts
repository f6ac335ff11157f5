import test from 'node:test';
import assert from 'node:assert/strict';
import { classifyChange, compareCellAddresses, diff, hasExternalReference } from './differ';
import { cellRecord } from '../types';

test('a new cell is reported as a single added change', () => {
    const changes = diff(
        { Sheet1: { A1: cellRecord(1) } },
        { Sheet1: { A1: cellRecord(1), B1: cellRecord(2) } }
    );
    assert.deepEqual(changes, [
        { worksheet: 'Sheet1', address: 'B1', oldCell: null, newCell: cellRecord(2), kind: 'added' },
    ]);
});

test('same internal formula with a new result is indirect, not direct', () => {
    const changes = diff(
        { Sheet1: { A1: cellRecord(2, '=1+1') } },
        { Sheet1: { A1: cellRecord(3, '=1+1') } }
    );
    assert.equal(changes.length, 1);
    assert.equal(changes[0].kind, 'indirect_changed');
});

test('same external formula with a new result is an external reference update', () => {
    assert.equal(classifyChange(cellRecord(5, '=[1]Rates!B2'), cellRecord(6, '=[1]Rates!B2')), 'external_ref_updated');
    assert.equal(
        classifyChange(cellRecord(5, "='C:\\share\\[Rates.xlsx]Q1'!B2"), cellRecord(7, "='C:\\share\\[Rates.xlsx]Q1'!B2")),
        'external_ref_updated'
    );
});

test('classification covers deletion, formula edits and plain values', () => {
    assert.equal(classifyChange(cellRecord(1), null), 'deleted');
    assert.equal(classifyChange(cellRecord(2, '=1+1'), cellRecord(2, '=2*1')), 'formula_changed');
    assert.equal(classifyChange(cellRecord(2, '=1+1'), cellRecord(2)), 'formula_changed');
    assert.equal(classifyChange(cellRecord('a'), cellRecord('b')), 'direct_value_changed');
    assert.equal(classifyChange(cellRecord('a'), cellRecord('a')), null);
    assert.equal(classifyChange(cellRecord(4, '=A1'), cellRecord(4, '=A1')), null);
});

test('worksheets present on one side are diffed against an empty sheet', () => {
    const changes = diff(
        { Old: { A1: cellRecord('gone') } },
        { New: { B2: cellRecord('here') } }
    );
    assert.deepEqual(changes.map((change) => [change.worksheet, change.address, change.kind]), [
        ['New', 'B2', 'added'],
        ['Old', 'A1', 'deleted'],
    ]);
});

test('changes are ordered row first, then column', () => {
    const changes = diff({}, {
        Sheet1: { B10: cellRecord(1), AA1: cellRecord(2), B1: cellRecord(3), A2: cellRecord(4) },
    });
    assert.deepEqual(changes.map((change) => change.address), ['B1', 'AA1', 'A2', 'B10']);
    assert.ok(compareCellAddresses('Z1', 'AA1') < 0);
});

test('plain sheet references and quoted local sheet names are not external', () => {
    assert.equal(hasExternalReference('=Sheet2!A1'), false);
    assert.equal(hasExternalReference("='Monthly Totals'!A1"), false);
    assert.equal(hasExternalReference("='\\\\server\\finance\\[Plan.xlsm]Costs'!C3"), true);
});
