/**
 * Shared test fixtures: Boxer terms and batch output builders.
 */

export const TERMS = {
    dog: 'drs([[1001]:x0],[[1002]:pred(x0,dog,n,0)])',
    dogBarks: 'drs([[1001]:x0,[1002]:x1],[[1002]:pred(x0,dog,n,0),[1003]:pred(x1,bark,v,0),[]:rel(x1,x0,agent,0)])',
    compoundNoun: 'drs([],[[0]:rel(x0,x1,nn,0)])',
    date: "drs([[1001]:x0],[[1004]:timex(x0,date([]: +, []:'XXXX', [1004]:'04', []:'XX'))])",
    question: 'whq([des:thing],drs([[1001]:x0],[[1001]:pred(x0,person,n,0)]),x0,drs([],[[1002]:pred(x0,sleep,v,0)]))',
    unclosed: 'drs([[1001]:x0],[[1002]:pred(x0,dog,n,0)',
};

/**
 * Lines Boxer prints for one discourse: the id marker, the sem/5 header four
 * lines below it and the DRS term eight lines below it.
 */
export function boxerBlock(discourseId: string, drsId: number, term: string): string[] {
    return [
        `id(${discourseId},${drsId}).`,
        '',
        '%%%  ',
        '%%%  ',
        `sem(${drsId},[${drsId}001:[tok:'A',pos:'DT',lemma:a,namex:'O']],`,
        '[],',
        '[],',
        '',
        `${term}).`,
    ];
}

export function boxerOutput(...blocks: string[][]): string {
    const header = [
        ':- multifile     sem/5, id/2.',
        ':- discontiguous sem/5, id/2.',
        ':- dynamic       sem/5, id/2.',
        '',
    ];
    return [...header, ...blocks.flatMap(block => [...block, ''])].join('\n');
}
