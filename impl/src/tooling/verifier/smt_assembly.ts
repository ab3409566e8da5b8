//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import assert from "assert";

import { allFields, fieldAccessor, NO_PACKET_NAME, PACKET_CONS_NAME, SymbolicPacket } from "../../ast/packet";
import { SMTExp, SMTType } from "./smt_exp";

class SMTFunction {
    readonly fname: string;
    readonly args: { vname: string, vtype: SMTType }[];
    readonly result: SMTType;

    readonly body: SMTExp;

    constructor(fname: string, args: { vname: string, vtype: SMTType }[], result: SMTType, body: SMTExp) {
        this.fname = fname;
        this.args = args;
        this.result = result;

        this.body = body;
    }

    static create(fname: string, args: { vname: string, vtype: SMTType }[], result: SMTType, body: SMTExp): SMTFunction {
        return new SMTFunction(fname, args, result, body);
    }

    emitSMT2(): string {
        const args = this.args.map((arg) => `(${arg.vname} ${arg.vtype.name})`);
        const body = this.body.emitSMT2("  ");

        return `(define-fun ${this.fname} (${args.join(" ")}) ${this.result.name}\n  ${body}\n)`;
    }
}

type SMTAction = { tag: "comment", text: string } | { tag: "assert", exp: SMTExp };

type SMT2FileInfo = {
    TYPE_DECLS: string[],
    FUNCTION_DECLS: string[],
    CONST_DECLS: string[],
    ACTION: string[]
};

/**
 * One self-contained SMT-LIB 2 program: the Packet datatype, the macros a run created, one
 * constant per packet variable, and the assertions of the query.
 */
class SMTAssembly {
    functions: SMTFunction[] = [];
    packets: SymbolicPacket[] = [];
    actions: SMTAction[] = [];

    constructor(functions: SMTFunction[], packets: SymbolicPacket[]) {
        this.functions = functions;
        this.packets = packets;
    }

    addComment(text: string) {
        this.actions.push({ tag: "comment", text: text.replace(/[\r\n]+/g, " ") });
    }

    addAssert(exp: SMTExp) {
        this.actions.push({ tag: "assert", exp: exp });
    }

    getAssertions(): SMTExp[] {
        let asserts: SMTExp[] = [];
        this.actions.forEach((act) => {
            if (act.tag === "assert") {
                asserts.push(act.exp);
            }
        });

        return asserts;
    }

    private static topoVisit(fname: string, callgraph: Map<string, Set<string>>, pending: Set<string>, tordered: string[]) {
        if (tordered.includes(fname)) {
            return;
        }

        assert(!pending.has(fname), `recursive macro definition ${fname}`);
        pending.add(fname);

        const callees = callgraph.get(fname);
        if (callees !== undefined) {
            callees.forEach((callee) => SMTAssembly.topoVisit(callee, callgraph, pending, tordered));
        }

        pending.delete(fname);
        tordered.push(fname);
    }

    //callees before callers, otherwise in creation order
    private orderFunctions(): SMTFunction[] {
        const okinv = new Set<string>(this.functions.map((f) => f.fname));
        assert(okinv.size === this.functions.length, "duplicate macro definition in assembly");

        let callgraph = new Map<string, Set<string>>();
        this.functions.forEach((smtfun) => {
            let ac = new Set<string>();
            smtfun.body.computeCallees(ac);

            callgraph.set(smtfun.fname, new Set<string>([...ac].filter((cc) => okinv.has(cc))));
        });

        let tordered: string[] = [];
        this.functions.forEach((smtfun) => SMTAssembly.topoVisit(smtfun.fname, callgraph, new Set<string>(), tordered));

        let ordered: SMTFunction[] = [];
        tordered.forEach((fname) => {
            const smtfun = this.functions.find((f) => f.fname === fname);
            if (smtfun !== undefined) {
                ordered.push(smtfun);
            }
        });

        return ordered;
    }

    generateSMT2AssemblyInfo(): SMT2FileInfo {
        const fieldDecls = allFields.map((f) => `(${fieldAccessor(f)} ${SMTType.intType.name})`);
        const packetDecl = `(declare-datatypes ((${SMTType.packetType.name} 0)) (((${PACKET_CONS_NAME} ${fieldDecls.join(" ")}) (${NO_PACKET_NAME}))))`;

        const action = this.actions.map((act) => {
            if (act.tag === "comment") {
                return `; ${act.text}`;
            }
            else {
                return `(assert\n  ${act.exp.emitSMT2("  ")}\n)`;
            }
        });

        return {
            TYPE_DECLS: [packetDecl],
            FUNCTION_DECLS: this.orderFunctions().map((f) => f.emitSMT2()),
            CONST_DECLS: this.packets.map((pkt) => `(declare-const ${pkt.name} ${SMTType.packetType.name})`),
            ACTION: action
        };
    }

    buildSMT2file(withCheckSat: boolean): string {
        const sfileinfo = this.generateSMT2AssemblyInfo();

        function joinSection(name: string, data: string[]): string {
            if (data.length === 0) {
                return `;;${name};;\n;;NO DATA;;`;
            }
            else {
                return `;;${name};;\n${data.join("\n")}`;
            }
        }

        const contents = [
            joinSection("TYPE_DECLS", sfileinfo.TYPE_DECLS),
            joinSection("FUNCTION_DECLS", sfileinfo.FUNCTION_DECLS),
            joinSection("CONST_DECLS", sfileinfo.CONST_DECLS),
            joinSection("ACTION", sfileinfo.ACTION)
        ];

        if (withCheckSat) {
            contents.push("(check-sat)");
        }

        return contents.join("\n\n") + "\n";
    }
}

export type { SMTAction, SMT2FileInfo };
export {
    SMTFunction,
    SMTAssembly
};
