//-------------------------------------------------------------------------------------------------------
// Copyright (C) Microsoft. All rights reserved.
// Licensed under the MIT license. See LICENSE.txt file in the project root for full license information.
//-------------------------------------------------------------------------------------------------------

type Result<T, E> = { ok: true, value: T } | { ok: false, error: E };

function okResult<T>(value: T): { ok: true, value: T } {
    return { ok: true, value: value };
}

function errResult<E>(error: E): { ok: false, error: E } {
    return { ok: false, error: error };
}

//the input policy is outside the (policy; topology)* fragment the compiler accepts
class ShapeError extends Error {
    readonly kind = "ShapeError";
    readonly construct: string;

    constructor(construct: string, detail: string) {
        super(`policy not in accepted normal form -- ${construct}: ${detail}`);
        this.name = "ShapeError";
        this.construct = construct;
    }
}

class SolverError extends Error {
    readonly kind = "SolverError";
    readonly output: string;

    constructor(msg: string, output: string) {
        super(msg);
        this.name = "SolverError";
        this.output = output;
    }
}

export type { Result };
export {
    okResult, errResult,
    ShapeError, SolverError
};
