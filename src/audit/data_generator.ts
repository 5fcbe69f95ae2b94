import { addDays, format, parse, setDate, startOfMonth, subMonths } from 'date-fns';
import { Application, Decision, Transaction } from '../types';

export type Persona = 'salaried' | 'benefits' | 'gig' | 'stacked_hcstc' | 'gambler' | 'thin_file';

export interface SyntheticApplicant {
    application: Application;
    persona: Persona;
    expectedDecisions: Decision[];
}

const PERSONAS: Persona[] = ['salaried', 'benefits', 'gig', 'stacked_hcstc', 'gambler', 'thin_file'];

const EXPECTED: Record<Persona, Decision[]> = {
    salaried: ['APPROVE', 'REFER'],
    benefits: ['APPROVE', 'REFER'],
    gig: ['REFER', 'DECLINE'],
    stacked_hcstc: ['DECLINE'],
    gambler: ['REFER', 'DECLINE'],
    thin_file: ['REFER', 'DECLINE'],
};

const EMPLOYERS = ['ACME WIDGETS LTD', 'NORTHGATE LOGISTICS LTD', 'BRIGHTWATER CARE LIMITED', 'HALCYON FOODS PLC'];
const LENDERS = [
    'LENDING STREAM', 'DRAFTY', 'MR LENDER', 'MONEYBOAT', 'CASHFLOAT',
    'QUIDMARKET', 'LOANS 2 GO', 'POLAR CREDIT', 'SALAD MONEY',
];
const GROCERS = ['TESCO STORES', 'ASDA SUPERSTORE', 'ALDI', 'SAINSBURYS'];
const BOOKMAKERS = ['BET365', 'SKYBET', 'PADDY POWER', 'BETFRED'];

/** mulberry32: small, fast and reproducible across runs for a given seed. */
export function createRng(seed: number): () => number {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export class DataGenerator {
    private readonly rng: () => number;
    private readonly anchor: Date;

    constructor(seed: number, anchorDate = '2026-09-30') {
        this.rng = createRng(seed);
        this.anchor = parse(anchorDate, 'yyyy-MM-dd', new Date(0));
    }

    generateBatch(count: number): SyntheticApplicant[] {
        const batch: SyntheticApplicant[] = [];
        for (let i = 0; i < count; i++) {
            batch.push(this.generateApplicant(PERSONAS[i % PERSONAS.length], i));
        }
        return batch;
    }

    generateApplicant(persona: Persona, index: number): SyntheticApplicant {
        const transactions: Transaction[] = [];
        const months = persona === 'thin_file' ? 1 : 3;

        for (let m = months - 1; m >= 0; m--) {
            const monthStart = subMonths(startOfMonth(this.anchor), m);
            this.addIncome(persona, monthStart, transactions);
            this.addEssentials(monthStart, transactions);
            this.addPersonaSpend(persona, monthStart, transactions);
        }

        return {
            persona,
            expectedDecisions: EXPECTED[persona],
            application: {
                applicationRef: `audit-${String(index).padStart(4, '0')}`,
                transactions,
                loanRequest: { principal: 300 + 100 * this.int(0, 7), termMonths: 3 + this.int(0, 3) },
                currentBalance: this.money(50, 900),
            },
        };
    }

    private addIncome(persona: Persona, monthStart: Date, out: Transaction[]): void {
        switch (persona) {
            case 'salaried':
            case 'stacked_hcstc':
            case 'gambler': {
                const employer = EMPLOYERS[this.int(0, EMPLOYERS.length - 1)];
                out.push(this.txn(setDate(monthStart, 25), -this.money(1900, 2600), `BGC ${employer} SALARY`));
                break;
            }
            case 'benefits':
                out.push(this.txn(setDate(monthStart, 8), -this.money(1150, 1400), 'DWP UNIVERSAL CREDIT'));
                out.push(this.txn(setDate(monthStart, 15), -96.25, 'HMRC CHILD BENEFIT'));
                break;
            case 'gig':
                for (let w = 0; w < 4; w++) {
                    out.push(this.txn(addDays(monthStart, 2 + 7 * w), -this.money(90, 240), 'UBER BV PAYOUT'));
                }
                break;
            case 'thin_file':
                out.push(this.txn(setDate(monthStart, 12), -this.money(400, 700), 'FASTER PAYMENT J SMITH'));
                break;
        }
    }

    private addEssentials(monthStart: Date, out: Transaction[]): void {
        out.push(this.txn(setDate(monthStart, 1), this.money(550, 800), 'RENT PAYMENT LANDLORD'));
        out.push(this.txn(setDate(monthStart, 3), this.money(95, 140), 'BRITISH GAS DD'));
        out.push(this.txn(setDate(monthStart, 5), this.money(120, 160), 'COUNCIL TAX DD'));
        for (let w = 0; w < 4; w++) {
            const grocer = GROCERS[this.int(0, GROCERS.length - 1)];
            out.push(this.txn(addDays(monthStart, 4 + 7 * w), this.money(35, 85), `CARD PAYMENT ${grocer}`));
        }
    }

    private addPersonaSpend(persona: Persona, monthStart: Date, out: Transaction[]): void {
        if (persona === 'stacked_hcstc') {
            for (let l = 0; l < 8; l++) {
                out.push(this.txn(addDays(monthStart, 9 + l), this.money(60, 140), `${LENDERS[l]} REPAYMENT`));
            }
        }
        if (persona === 'gambler') {
            for (let b = 0; b < 6; b++) {
                const bookmaker = BOOKMAKERS[this.int(0, BOOKMAKERS.length - 1)];
                out.push(this.txn(addDays(monthStart, 2 + 4 * b), this.money(40, 120), bookmaker));
            }
        }
        if (persona === 'thin_file' && this.rng() < 0.5) {
            out.push(this.txn(setDate(monthStart, 20), 35, 'UNPAID ITEM CHARGE'));
        }
    }

    private txn(date: Date, amount: number, description: string): Transaction {
        return { date: format(date, 'yyyy-MM-dd'), amount, description };
    }

    private int(min: number, max: number): number {
        return min + Math.floor(this.rng() * (max - min + 1));
    }

    private money(min: number, max: number): number {
        return Math.round((min + this.rng() * (max - min)) * 100) / 100;
    }
}
