//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import assert from "assert";

import { Policy, PolicySeq, PolicyTag } from "../../ast/netkat";
import { SymbolicPacket } from "../../ast/packet";
import { nopacket } from "./macro_cache";
import { emitPolicy, PolicyRelation } from "./policy_emitter";
import { SMTCallSimple, SMTComment, SMTConst, SMTExp } from "./smt_exp";
import { VerificationContext } from "./verification_context";
import { errResult, okResult, Result, ShapeError } from "./verifier_errors";

type UnrolledRelation = {
    formula: SMTExp,
    frontier: SymbolicPacket[]
};

//the loop body of (p; t)*, anything else is a shape error
function extractLoopBody(program: Policy): Result<PolicySeq, ShapeError> {
    if (program.tag !== PolicyTag.Star) {
        return errResult(new ShapeError(program.tag, `expected a program of the form (policy; topology)* -- ${program.toString()}`));
    }

    if (program.body.tag !== PolicyTag.Seq) {
        return errResult(new ShapeError(program.body.tag, `iterated body must be policy; topology -- ${program.toString()}`));
    }

    return okResult(program.body);
}

//exactly `depth` copies of the body chained from input
function emitHops(ctx: VerificationContext, body: PolicySeq, input: SymbolicPacket, depth: number): Result<PolicyRelation, ShapeError> {
    if (depth === 0) {
        return okResult({ formula: SMTConst.trueConst, output: input });
    }

    let formulas: SMTExp[] = [];
    let current = input;
    for (let i = 0; i < depth; ++i) {
        const pres = emitPolicy(ctx, body.lhs, current);
        if (!pres.ok) {
            return pres;
        }

        const tres = emitPolicy(ctx, body.rhs, pres.value.output);
        if (!tres.ok) {
            return tres;
        }

        formulas.push(new SMTComment(`hop ${i + 1} of ${depth}: policy`, pres.value.formula));
        formulas.push(new SMTComment(`hop ${i + 1} of ${depth}: topology`, tres.value.formula));
        current = tres.value.output;
    }

    return okResult({ formula: SMTCallSimple.makeAndOf(...formulas), output: current });
}

/**
 * Unroll (p; t)* up to k hops. Each depth is compiled on its own and may also be satisfied by its
 * reached packet being dropped, so a packet dropped early does not constrain deeper depths.
 */
function unroll(ctx: VerificationContext, program: Policy, input: SymbolicPacket, k: number): Result<UnrolledRelation, ShapeError> {
    assert(Number.isSafeInteger(k) && k >= 0, `hop bound must be a non-negative integer, got ${k}`);

    const bres = extractLoopBody(program);
    if (!bres.ok) {
        return bres;
    }

    let depths: SMTExp[] = [];
    let frontier: SymbolicPacket[] = [];
    for (let d = 0; d <= k; ++d) {
        const hres = emitHops(ctx, bres.value, input, d);
        if (!hres.ok) {
            return hres;
        }

        const reached = hres.value.output;
        const blacklist = new SMTComment(`blacklisting ${reached.name}`, SMTCallSimple.makeEq(ctx.packetVar(reached), nopacket));

        depths.push(new SMTComment(`attempting to forward in ${d} hops`, SMTCallSimple.makeOrOf(hres.value.formula, blacklist)));
        frontier.push(reached);
    }

    return okResult({ formula: SMTCallSimple.makeAndOf(...depths), frontier: frontier });
}

export type { UnrolledRelation };
export {
    extractLoopBody, emitHops, unroll
};
