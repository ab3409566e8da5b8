//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

class SMTType {
    readonly name: string;

    constructor(name: string) {
        this.name = name;
    }

    static readonly boolType = new SMTType("Bool");
    static readonly intType = new SMTType("Int");
    static readonly packetType = new SMTType("Packet");
}

abstract class SMTExp {
    abstract emitSMT2(indent: string | undefined): string;

    abstract computeCallees(callees: Set<string>): void;
}

class SMTVar extends SMTExp {
    readonly vname: string;

    constructor(vname: string) {
        super();

        this.vname = vname;
    }

    emitSMT2(indent: string | undefined): string {
        return this.vname;
    }

    computeCallees(callees: Set<string>): void {
        //Nothing to do in many cases
    }
}

class SMTConst extends SMTExp {
    readonly cname: string;

    constructor(cname: string) {
        super();

        this.cname = cname;
    }

    emitSMT2(indent: string | undefined): string {
        return this.cname;
    }

    computeCallees(callees: Set<string>): void {
        //Nothing to do in many cases
    }

    static readonly trueConst = new SMTConst("true");
    static readonly falseConst = new SMTConst("false");

    static makeInt(val: bigint): SMTConst {
        return new SMTConst(val < 0n ? `(- ${-val})` : `${val}`);
    }
}

//builtin operators -- never recorded as callees
class SMTCallSimple extends SMTExp {
    readonly fname: string;
    readonly args: SMTExp[];

    constructor(fname: string, args: SMTExp[]) {
        super();

        this.fname = fname;
        this.args = args;
    }

    emitSMT2(indent: string | undefined): string {
        if (this.args.length === 0) {
            return this.fname;
        }

        if (indent === undefined || (this.fname !== "and" && this.fname !== "or")) {
            return `(${this.fname} ${this.args.map((arg) => arg.emitSMT2(undefined)).join(" ")})`;
        }
        else {
            const nindent = indent + "  ";
            return `(${this.fname}\n${this.args.map((arg) => nindent + arg.emitSMT2(nindent)).join("\n")}\n${indent})`;
        }
    }

    computeCallees(callees: Set<string>): void {
        this.args.forEach((arg) => arg.computeCallees(callees));
    }

    static makeEq(lhs: SMTExp, rhs: SMTExp): SMTExp {
        return new SMTCallSimple("=", [lhs, rhs]);
    }

    static makeNotEq(lhs: SMTExp, rhs: SMTExp): SMTExp {
        return new SMTCallSimple("not", [new SMTCallSimple("=", [lhs, rhs])]);
    }

    static makeBinOp(op: "<" | ">", lhs: SMTExp, rhs: SMTExp): SMTExp {
        return new SMTCallSimple(op, [lhs, rhs]);
    }

    //an empty conjunction is true and an empty disjunction is false, "(and)" is not valid SMT-LIB
    static makeAndOf(...exps: SMTExp[]): SMTExp {
        return exps.length === 0 ? SMTConst.trueConst : (exps.length === 1 ? exps[0] : new SMTCallSimple("and", exps));
    }

    static makeOrOf(...exps: SMTExp[]): SMTExp {
        return exps.length === 0 ? SMTConst.falseConst : (exps.length === 1 ? exps[0] : new SMTCallSimple("or", exps));
    }
}

//application of a declared or defined function (field accessors, macros)
class SMTCallGeneral extends SMTExp {
    readonly fname: string;
    readonly args: SMTExp[];

    constructor(fname: string, args: SMTExp[]) {
        super();

        this.fname = fname;
        this.args = args;
    }

    emitSMT2(indent: string | undefined): string {
        return this.args.length === 0 ? this.fname : `(${this.fname} ${this.args.map((arg) => arg.emitSMT2(undefined)).join(" ")})`;
    }

    computeCallees(callees: Set<string>): void {
        callees.add(this.fname);
        this.args.forEach((arg) => arg.computeCallees(callees));
    }
}

class SMTIf extends SMTExp {
    readonly cond: SMTExp;
    readonly tval: SMTExp;
    readonly fval: SMTExp;

    constructor(cond: SMTExp, tval: SMTExp, fval: SMTExp) {
        super();

        this.cond = cond;
        this.tval = tval;
        this.fval = fval;
    }

    emitSMT2(indent: string | undefined): string {
        if (indent === undefined) {
            return `(ite ${this.cond.emitSMT2(undefined)} ${this.tval.emitSMT2(undefined)} ${this.fval.emitSMT2(undefined)})`;
        }
        else {
            return `(ite ${this.cond.emitSMT2(undefined)}\n${indent + "  "}${this.tval.emitSMT2(indent + "  ")}\n${indent + "  "}${this.fval.emitSMT2(indent + "  ")}\n${indent})`;
        }
    }

    computeCallees(callees: Set<string>): void {
        this.cond.computeCallees(callees);
        this.tval.computeCallees(callees);
        this.fval.computeCallees(callees);
    }
}

//semantically transparent, the note only shows up in multi-line output
class SMTComment extends SMTExp {
    readonly note: string;
    readonly exp: SMTExp;

    constructor(note: string, exp: SMTExp) {
        super();

        this.note = note.replace(/[\r\n]+/g, " ");
        this.exp = exp;
    }

    emitSMT2(indent: string | undefined): string {
        if (indent === undefined) {
            return this.exp.emitSMT2(undefined);
        }
        else {
            return `; ${this.note}\n${indent}${this.exp.emitSMT2(indent)}`;
        }
    }

    computeCallees(callees: Set<string>): void {
        this.exp.computeCallees(callees);
    }
}

export {
    SMTType, SMTExp, SMTVar, SMTConst,
    SMTCallSimple, SMTCallGeneral,
    SMTIf, SMTComment
};
