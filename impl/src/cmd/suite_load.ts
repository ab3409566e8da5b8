//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

import * as FS from "fs";

import {
    and, choice, filter, link, mod, neg, or, par, pfalse, Policy, Predicate, ptrue, seq, star, test
} from "../ast/netkat";
import { Field, fieldMax, isField } from "../ast/packet";
import { SolverVerdict } from "../tooling/verifier/smt_solver";

class SuiteFormatError extends Error {
    readonly kind = "SuiteFormatError";
    readonly path: string;

    constructor(path: string, msg: string) {
        super(`${path}: ${msg}`);
        this.name = "SuiteFormatError";
        this.path = path;
    }
}

type CheckCase = {
    name: string,
    entry: Predicate,
    program: Policy,
    exit: Predicate,
    k: number | undefined,
    oracle: SolverVerdict | undefined
};

function isObject(jv: unknown): jv is { [key: string]: unknown } {
    return typeof jv === "object" && jv !== null && !Array.isArray(jv);
}

//{"op": arg} with exactly one key
function singleEntry(jv: unknown, path: string): [string, unknown] {
    if (!isObject(jv)) {
        throw new SuiteFormatError(path, `expected an object, got ${JSON.stringify(jv)}`);
    }

    const entries = Object.entries(jv);
    if (entries.length !== 1) {
        throw new SuiteFormatError(path, `expected exactly one operator, got ${entries.length} keys`);
    }

    return entries[0];
}

function tupleOf(jv: unknown, len: number, path: string): unknown[] {
    if (!Array.isArray(jv) || jv.length !== len) {
        throw new SuiteFormatError(path, `expected an array of ${len} elements`);
    }

    return jv;
}

function parseField(jv: unknown, path: string): Field {
    if (typeof jv !== "string" || !isField(jv)) {
        throw new SuiteFormatError(path, `unknown header field ${JSON.stringify(jv)}`);
    }

    return jv;
}

//JSON numbers lose precision past 2^53, wide values come in as decimal strings
function parseValue(jv: unknown, f: Field, path: string): bigint {
    let val: bigint;
    if (typeof jv === "number" && Number.isSafeInteger(jv)) {
        val = BigInt(jv);
    }
    else if (typeof jv === "string" && /^[0-9]+$/.test(jv)) {
        val = BigInt(jv);
    }
    else {
        throw new SuiteFormatError(path, `expected a non-negative integer, got ${JSON.stringify(jv)}`);
    }

    if (val < 0n || fieldMax(f) < val) {
        throw new SuiteFormatError(path, `value ${val} does not fit in field ${f}`);
    }

    return val;
}

function parsePredicate(jv: unknown, path: string): Predicate {
    if (jv === true) {
        return ptrue;
    }
    if (jv === false) {
        return pfalse;
    }

    const [op, arg] = singleEntry(jv, path);
    const argpath = `${path}.${op}`;
    switch (op) {
        case "test": {
            const [f, v] = tupleOf(arg, 2, argpath);
            const field = parseField(f, `${argpath}[0]`);
            return test(field, parseValue(v, field, `${argpath}[1]`));
        }
        case "not":
            return neg(parsePredicate(arg, argpath));
        case "and": {
            const [lhs, rhs] = tupleOf(arg, 2, argpath);
            return and(parsePredicate(lhs, `${argpath}[0]`), parsePredicate(rhs, `${argpath}[1]`));
        }
        case "or": {
            const [lhs, rhs] = tupleOf(arg, 2, argpath);
            return or(parsePredicate(lhs, `${argpath}[0]`), parsePredicate(rhs, `${argpath}[1]`));
        }
        default:
            throw new SuiteFormatError(path, `unknown predicate operator "${op}"`);
    }
}

function parsePolicy(jv: unknown, path: string): Policy {
    const [op, arg] = singleEntry(jv, path);
    const argpath = `${path}.${op}`;
    switch (op) {
        case "filter":
            return filter(parsePredicate(arg, argpath));
        case "mod": {
            const [f, v] = tupleOf(arg, 2, argpath);
            const field = parseField(f, `${argpath}[0]`);
            return mod(field, parseValue(v, field, `${argpath}[1]`));
        }
        case "par": {
            const [lhs, rhs] = tupleOf(arg, 2, argpath);
            return par(parsePolicy(lhs, `${argpath}[0]`), parsePolicy(rhs, `${argpath}[1]`));
        }
        case "seq": {
            const [lhs, rhs] = tupleOf(arg, 2, argpath);
            return seq(parsePolicy(lhs, `${argpath}[0]`), parsePolicy(rhs, `${argpath}[1]`));
        }
        case "star":
            return star(parsePolicy(arg, argpath));
        case "choice": {
            const [lhs, rhs, prob] = tupleOf(arg, 3, argpath);
            if (typeof prob !== "number" || !(0 <= prob && prob <= 1)) {
                throw new SuiteFormatError(`${argpath}[2]`, `expected a probability in [0, 1], got ${JSON.stringify(prob)}`);
            }

            return choice(parsePolicy(lhs, `${argpath}[0]`), parsePolicy(rhs, `${argpath}[1]`), prob);
        }
        case "link": {
            const [s1, p1, s2, p2] = tupleOf(arg, 4, argpath);
            return link(
                parseValue(s1, Field.Switch, `${argpath}[0]`), parseValue(p1, Field.InPort, `${argpath}[1]`),
                parseValue(s2, Field.Switch, `${argpath}[2]`), parseValue(p2, Field.InPort, `${argpath}[3]`)
            );
        }
        default:
            throw new SuiteFormatError(path, `unknown policy operator "${op}"`);
    }
}

function parseOracle(jv: unknown, path: string): SolverVerdict | undefined {
    if (jv === undefined || jv === null) {
        return undefined;
    }

    if (jv === "sat" || jv === true) {
        return "sat";
    }
    if (jv === "unsat" || jv === false) {
        return "unsat";
    }

    throw new SuiteFormatError(path, `expected "sat", "unsat" or a boolean, got ${JSON.stringify(jv)}`);
}

function parseCheckCase(jv: unknown, path: string): CheckCase {
    if (!isObject(jv)) {
        throw new SuiteFormatError(path, "expected a check object");
    }

    const name = jv["name"];
    if (typeof name !== "string" || name === "") {
        throw new SuiteFormatError(`${path}.name`, "expected a non-empty string");
    }

    let k: number | undefined = undefined;
    const jk = jv["k"];
    if (jk !== undefined) {
        if (typeof jk !== "number" || !Number.isSafeInteger(jk) || jk < 0) {
            throw new SuiteFormatError(`${path}.k`, `expected a non-negative integer hop bound, got ${JSON.stringify(jk)}`);
        }
        k = jk;
    }

    return {
        name: name,
        entry: parsePredicate(jv["entry"], `${path}.entry`),
        program: parsePolicy(jv["program"], `${path}.program`),
        exit: parsePredicate(jv["exit"], `${path}.exit`),
        k: k,
        oracle: parseOracle(jv["oracle"], `${path}.oracle`)
    };
}

//either {"checks": [...]} or a bare array of checks
function parseSuite(contents: string): CheckCase[] {
    let jv: unknown;
    try {
        jv = JSON.parse(contents);
    }
    catch (ex) {
        throw new SuiteFormatError("$", `not valid JSON -- ${ex}`);
    }

    let checks: unknown = jv;
    let path = "$";
    if (isObject(jv)) {
        checks = jv["checks"];
        path = "$.checks";
    }

    if (!Array.isArray(checks)) {
        throw new SuiteFormatError(path, "expected an array of checks");
    }

    const cases = checks.map((cc, i) => parseCheckCase(cc, `${path}[${i}]`));

    const seen = new Set<string>();
    cases.forEach((cc, i) => {
        if (seen.has(cc.name)) {
            throw new SuiteFormatError(`${path}[${i}].name`, `duplicate check name "${cc.name}"`);
        }
        seen.add(cc.name);
    });

    return cases;
}

function loadSuite(file: string): CheckCase[] {
    let contents: string;
    try {
        contents = FS.readFileSync(file).toString();
    }
    catch (ex) {
        throw new SuiteFormatError("$", `could not read ${file} -- ${ex}`);
    }

    return parseSuite(contents);
}

export type { CheckCase };
export {
    SuiteFormatError,
    parsePredicate, parsePolicy, parseSuite, loadSuite
};
