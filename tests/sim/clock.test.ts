import { describe, it } from "mocha";
import { expect } from "chai";
import fc from "fast-check";

import { LamportClock } from "../../src/sim/clock.js";
import { ClockOverflowError, SimulationError } from "../../src/sim/errors.js";
import { ERROR_CODES } from "../../src/types.js";

describe("sim/clock", () => {
  it("starts at zero and ticks by one", () => {
    const clock = new LamportClock();
    expect(clock.value).to.equal(0);
    expect(clock.tick()).to.equal(1);
    expect(clock.tick()).to.equal(2);
    expect(clock.toString()).to.equal("LC(2)");
  });

  it("jumps past larger remote timestamps and ignores smaller ones", () => {
    const clock = new LamportClock();
    expect(clock.receive(5)).to.equal(6);
    expect(clock.receive(2)).to.equal(7);
    expect(clock.value).to.equal(7);
  });

  it("always ends strictly above both operands after a receive", () => {
    fc.assert(
      fc.property(fc.array(fc.nat({ max: 1_000_000 }), { maxLength: 20 }), fc.nat({ max: 1_000_000 }), (history, remote) => {
        const clock = new LamportClock();
        for (const value of history) {
          clock.receive(value);
        }
        const before = clock.value;
        const after = clock.receive(remote);
        expect(after).to.equal(Math.max(before, remote) + 1);
      }),
    );
  });

  it("refuses to advance past the safe integer range", () => {
    const clock = new LamportClock();
    expect(clock.receive(Number.MAX_SAFE_INTEGER - 1)).to.equal(Number.MAX_SAFE_INTEGER);
    expect(() => clock.tick()).to.throw(ClockOverflowError);

    const fresh = new LamportClock();
    expect(() => fresh.receive(Number.MAX_SAFE_INTEGER)).to.throw(ClockOverflowError);
    expect(new ClockOverflowError()).to.be.instanceOf(SimulationError);
    expect(new ClockOverflowError().code).to.equal(ERROR_CODES.SIM_INTERNAL);
    expect(fresh.value).to.equal(0);
  });
});
