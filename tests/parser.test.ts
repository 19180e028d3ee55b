import { expect } from 'chai';
import { describe, it } from 'mocha';
import { parseArgumentList } from '../src/cli/literal';
import { parseDottedCall, parseLine, tokenize } from '../src/cli/parser';

describe('Command parsing', () => {

    describe('tokenize', () => {
        it('should split on whitespace', () => {
            expect(tokenize('show  User\t1234')).to.deep.equal(['show', 'User', '1234']);
        });

        it('should keep double-quoted segments together without their quotes', () => {
            expect(tokenize('update User 1 name "My little house"')).to.deep.equal(['update', 'User', '1', 'name', 'My little house']);
        });

        it('should honour escaped quotes and backslashes inside quotes', () => {
            expect(tokenize('update User 1 bio "say \\"hi\\" \\\\ bye"')).to.deep.equal(['update', 'User', '1', 'bio', 'say "hi" \\ bye']);
        });

        it('should join quoted text glued to unquoted text', () => {
            expect(tokenize('a"b c"d e')).to.deep.equal(['ab cd', 'e']);
        });

        it('should keep an empty quoted string as a token', () => {
            expect(tokenize('update User 1 name ""')).to.deep.equal(['update', 'User', '1', 'name', '']);
        });

        it('should run an unterminated quote to the end of the line', () => {
            expect(tokenize('update User 1 name "open ended')).to.deep.equal(['update', 'User', '1', 'name', 'open ended']);
        });
    });

    describe('parseArgumentList', () => {
        it('should read quoted strings and barewords', () => {
            expect(parseArgumentList(`"a b", 'c', 42, d-4`)).to.deep.equal(['a b', 'c', '42', 'd-4']);
        });

        it('should read nested lists and mappings', () => {
            expect(parseArgumentList(`"1", {'name': "x", "tags": ['a', "b"], 'n': 3}`))
                .to.deep.equal(['1', { name: 'x', tags: ['a', 'b'], n: '3' }]);
        });

        it('should keep __proto__ as an ordinary mapping key', () => {
            const [, mapping] = parseArgumentList(`"1", {'__proto__': "x"}`) ?? [];

            expect(Object.getPrototypeOf(mapping)).to.equal(Object.prototype);
            expect(Object.entries(mapping ?? {})).to.deep.equal([['__proto__', 'x']]);
        });

        it('should return an empty list for blank input', () => {
            expect(parseArgumentList('  ')).to.deep.equal([]);
        });

        it('should return null for malformed input', () => {
            expect(parseArgumentList('"unterminated')).to.be.null;
            expect(parseArgumentList('"a" "b"')).to.be.null;
            expect(parseArgumentList("{'a' 1}")).to.be.null;
            expect(parseArgumentList('"a",')).to.be.null;
        });
    });

    describe('parseDottedCall', () => {
        it('should translate each argument shape', () => {
            expect(parseDottedCall('User', 'all', '')).to.deep.equal({ verb: 'all', args: ['User'] });
            expect(parseDottedCall('User', 'show', '"42"')).to.deep.equal({ verb: 'show', args: ['User', '42'] });
            expect(parseDottedCall('User', 'update', '"42", "age", 89'))
                .to.deep.equal({ verb: 'update', args: ['User', '42', 'age', '89'] });
            expect(parseDottedCall('User', 'update', `"42", {'age': 89}`))
                .to.deep.equal({ verb: 'update', args: ['User', '42'], mapping: { age: '89' } });
        });

        it('should carry non-text values of a single pair as a mapping', () => {
            expect(parseDottedCall('Place', 'update', `"42", "amenity_ids", ["a"]`))
                .to.deep.equal({ verb: 'update', args: ['Place', '42'], mapping: { amenity_ids: ['a'] } });
        });

        it('should refuse unsupported verbs and shapes', () => {
            expect(parseDottedCall('User', 'launch', '')).to.be.null;
            expect(parseDottedCall('User', 'update', '"1", "a", "b", "c"')).to.be.null;
            expect(parseDottedCall('User', 'update', `"1", {'a': 1}, "x"`)).to.be.null;
            expect(parseDottedCall('User', 'show', `["1"]`)).to.be.null;
        });
    });

    describe('parseLine', () => {
        it('should recognise empty lines', () => {
            expect(parseLine('   ')).to.deep.equal({ type: 'empty' });
        });

        it('should prefer the dotted form', () => {
            expect(parseLine('  User.count()  ')).to.deep.equal({ type: 'command', command: { verb: 'count', args: ['User'] } });
        });

        it('should flag dotted calls it cannot translate', () => {
            expect(parseLine('User.show("1", )')).to.deep.equal({ type: 'invalid' });
        });

        it('should fall back to the space-separated form', () => {
            expect(parseLine('show User 1')).to.deep.equal({ type: 'command', command: { verb: 'show', args: ['User', '1'] } });
        });
    });
});
