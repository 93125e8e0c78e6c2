import {
    buildPredicate,
    decodeIndex,
    encodeIndex,
    makeVariable,
    parsePredicateArity,
    relationName,
    sanitizeName,
} from '../src/utils/predicateNaming.js';
import { parseDiscourse } from '../src/parser/index.js';
import { traverse } from '../src/drs/visitor.js';
import { LogicException } from '../src/types/errors.js';

describe('sanitizeName', () => {
    test('keeps ASCII letters, digits and underscores only', () => {
        expect(sanitizeName("New-York's")).toBe('NewYorks');
        expect(sanitizeName('e.g._2')).toBe('eg_2');
        expect(sanitizeName('café')).toBe('caf');
    });

    test('is idempotent', () => {
        for (const name of ['dog', "o'neill", 'a b/c', 'r_nn_2', '']) {
            const once = sanitizeName(name);
            expect(sanitizeName(once)).toBe(once);
        }
    });
});

describe('Index decoding', () => {
    test('decodes sentence and word positions', () => {
        expect(decodeIndex(1001)).toEqual({ sentence: 0, word: 0 });
        expect(decodeIndex(2015)).toEqual({ sentence: 1, word: 14 });
        expect(decodeIndex(1004)).toEqual({ sentence: 0, word: 3 });
    });

    test('re-encoding recovers every index', () => {
        for (let n = 1001; n <= 9999; n++) {
            expect(encodeIndex(decodeIndex(n))).toBe(n);
        }
    });
});

describe('buildPredicate', () => {
    test('builds the full canonical form', () => {
        expect(buildPredicate({
            pos: 'v',
            lemma: 'see',
            indices: [{ sentence: 3, word: 4 }],
            arity: 2,
            discourseId: 't',
            occurIndex: true,
        })).toBe('v_see_t_s3_w4_2');
    });

    test('marks positions with decoded index values', () => {
        const parts = { pos: 'v', lemma: 'see', arity: 2, discourseId: 't', occurIndex: true };
        expect(buildPredicate({ ...parts, indices: [decodeIndex(4005)] })).toBe('v_see_t_s3_w4_2');
        expect(buildPredicate({ ...parts, indices: [decodeIndex(3004)] })).toBe('v_see_t_s2_w3_2');
    });

    test('uses only the first index pair', () => {
        expect(buildPredicate({
            pos: 'n',
            lemma: 'dog',
            indices: [{ sentence: 1, word: 2 }, { sentence: 5, word: 6 }],
            arity: 1,
            occurIndex: true,
        })).toBe('n_dog_s1_w2_1');
    });

    test('omits the position marker unless occurrence indexing is on', () => {
        expect(buildPredicate({ pos: 'n', lemma: 'dog', indices: [{ sentence: 0, word: 1 }], arity: 1 })).toBe('n_dog_1');
    });

    test('forces relation names without indices', () => {
        expect(buildPredicate({
            pos: 'n',
            lemma: 'dog',
            indices: [],
            arity: 1,
            discourseId: 't',
            occurIndex: true,
        })).toBe('r_dog_1');
    });

    test('sanitizes the lemma', () => {
        expect(buildPredicate({ pos: 'a', lemma: 'well-known', indices: [{ sentence: 0, word: 0 }], arity: 1 })).toBe('a_wellknown_1');
    });

    test.each([0, -1, 1.5])('rejects arity %p', arity => {
        expect(() => buildPredicate({ pos: 'n', lemma: 'dog', indices: [], arity }))
            .toThrow(LogicException);
        try {
            buildPredicate({ pos: 'n', lemma: 'dog', indices: [], arity });
        } catch (e) {
            expect(e instanceof LogicException && e.code).toBe('INVALID_ARITY');
        }
    });
});

describe('Naming helpers', () => {
    test('relationName', () => {
        expect(relationName('nn', 2)).toBe('r_nn_2');
        expect(relationName('John', 1, 'n')).toBe('n_John_1');
        expect(() => relationName('nn', 0)).toThrow(LogicException);
    });

    test('makeVariable rewrites the internal prefix only', () => {
        expect(makeVariable('_G42')).toBe('z42');
        expect(makeVariable('x0')).toBe('x0');
        expect(makeVariable('G_1')).toBe('G_1');
    });

    test('parsePredicateArity', () => {
        expect(parsePredicateArity('v_see_t_s3_w4_2')).toBe(2);
        expect(parsePredicateArity('r_card_3')).toBe(3);
        expect(parsePredicateArity('dog')).toBeUndefined();
    });

    test('every parsed atom has as many arguments as its name declares', () => {
        const term = "drs([[1001]:x0,[1002]:x1,[1003]:x2],["
            + "[1001]:named(x0,'Mary',per,0),"
            + '[1002]:pred(x1,see,v,0),'
            + '[]:rel(x1,x0,agent,0),'
            + '[1003]:card(x2,2,eq),'
            + "[1004]:timex(x2,date([]:+,[]:'2001',[]:'XX',[]:'XX')),"
            + '[]:not(drs([],[[1005]:pred(x2,cat,n,0)]))'
            + '])';
        const drs = parseDiscourse(term, { occurIndex: true, discourseId: 'd7' });

        let atoms = 0;
        traverse(drs, node => {
            if (node.type === 'atom') {
                atoms++;
                expect(parsePredicateArity(node.predicate)).toBe(node.args.length);
            }
        });
        expect(atoms).toBe(8);
    });
});
