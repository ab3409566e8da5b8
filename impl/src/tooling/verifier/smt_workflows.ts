//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import * as FS from "fs";
import * as Path from "path";

import { Policy, Predicate, removeLinks } from "../../ast/netkat";
import { SymbolicPacket } from "../../ast/packet";
import { Topology } from "../../ast/topology";
import { emitPredicate } from "./predicate_emitter";
import { SMTAssembly } from "./smt_assembly";
import { SMTCallSimple, SMTExp } from "./smt_exp";
import { SolverVerdict } from "./smt_solver";
import { unroll } from "./unroller";
import { VerificationContext } from "./verification_context";
import { createSolver, defaultVerifierOptions, VerifierOptions } from "./verifier_options";
import { okResult, Result, ShapeError } from "./verifier_errors";

//extra constraint on a packet the query may end with
type SideCondition = (ctx: VerificationContext, pkt: SymbolicPacket) => SMTExp;

let debugfilectr = 0;

/**
 * Build the query "some packet matching entry, forwarded by program in at most k hops, ends in a
 * packet matching exit and every side condition". Nothing is solved here.
 */
function verifyProgram(ctx: VerificationContext, entry: Predicate, program: Policy, exit: Predicate, sideConditions: SideCondition[], k: number): Result<SMTAssembly, ShapeError> {
    const x = ctx.freshPacket();
    const entryFormula = emitPredicate(ctx, entry, x);

    const ures = unroll(ctx, removeLinks(program), x, k);
    if (!ures.ok) {
        return ures;
    }

    const frontier = ures.value.frontier;
    const exists = SMTCallSimple.makeOrOf(...frontier.map((v) => {
        return SMTCallSimple.makeAndOf(emitPredicate(ctx, exit, v), ...sideConditions.map((sc) => sc(ctx, v)));
    }));

    //all macros and packets are known only now
    let asm = ctx.createAssembly();
    asm.addAssert(entryFormula);
    asm.addAssert(ures.value.formula);
    asm.addComment(`We are choosing between ${frontier.map((v) => v.name).join(" ")}`);
    asm.addAssert(exists);

    return okResult(asm);
}

function dumpOffendingProgram(asm: SMTAssembly, vopts: VerifierOptions): string {
    const file = Path.join(vopts.dumpDir, `debug-${debugfilectr++}.smt2`);

    FS.mkdirSync(vopts.dumpDir, { recursive: true });
    FS.writeFileSync(file, asm.buildSMT2file(true));

    return file;
}

async function runSolve(name: string, asm: SMTAssembly, oracle: SolverVerdict | undefined, vopts: VerifierOptions): Promise<boolean> {
    const verdict = await createSolver(vopts).checkSat(asm);

    //without an expectation the verdict itself is the result
    if (oracle === undefined) {
        vopts.logger.info(`[check ${name}: ${verdict}]`);
        return verdict === "sat";
    }

    if (oracle === verdict) {
        return true;
    }

    vopts.logger.error(`[check ${name}: expected ${oracle} got ${verdict}]`);
    const file = dumpOffendingProgram(asm, vopts);
    vopts.logger.error(`Offending program is in ${file}`);

    return false;
}

async function checkReachabilityK(k: number, name: string, entry: Predicate, program: Policy, exit: Predicate, sideConditions: SideCondition[], oracle: SolverVerdict | undefined, vopts?: VerifierOptions): Promise<boolean> {
    const opts = vopts ?? defaultVerifierOptions();

    const ctx = new VerificationContext();
    const vres = verifyProgram(ctx, entry, program, exit, sideConditions, k);
    if (!vres.ok) {
        opts.logger.error(`[check ${name}: ${vres.error.message}]`);
        throw vres.error;
    }

    return runSolve(name, vres.value, oracle, opts);
}

//hop bound is the diameter of the switch graph the program's links describe
function hopBound(program: Policy): number {
    return Topology.fromPolicy(program).longestShortest();
}

async function checkReachability(name: string, entry: Predicate, program: Policy, exit: Predicate, oracle: SolverVerdict | undefined, vopts?: VerifierOptions): Promise<boolean> {
    return checkReachabilityK(hopBound(program), name, entry, program, exit, [], oracle, vopts);
}

export type { SideCondition };
export {
    verifyProgram, hopBound,
    checkReachabilityK, checkReachability
};
