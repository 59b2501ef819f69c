import { describe, it, expect, beforeEach } from "vitest";
import type { Track } from "@playhead/contracts";
import {
  updateCursor,
  resyncCursor,
  findActiveBlocks,
  classifyBlock,
} from "../../src/tracker/IntervalTracker";
import { createCursor, resetCursor, type TrackCursor } from "../../src/tracker/TrackCursor";
import { buildTrack } from "../../src/tracks/TrackBuilder";
import { spans, seededRandom, randomTrack, indicesOf } from "../_harness/tracks";

describe("IntervalTracker", () => {
  describe("empty track", () => {
    it("does nothing and stays before the first block", () => {
      const cursor = createCursor(buildTrack([]));

      const update = updateCursor(cursor, 5);

      expect(update.entered).toEqual([]);
      expect(update.exited).toEqual([]);
      expect(cursor.lastIndex).toBe(-1);
      expect(cursor.activeSet.size).toBe(0);
    });
  });

  describe("boundaries", () => {
    let track: Track;
    let cursor: TrackCursor;

    beforeEach(() => {
      track = spans([[5, 10]]);
      cursor = createCursor(track);
    });

    it("is inactive just before the start", () => {
      const update = updateCursor(cursor, 4.999);

      expect(update.entered).toEqual([]);
      expect(cursor.lastIndex).toBe(-1);
    });

    it("enters exactly at the start time", () => {
      const update = updateCursor(cursor, 5);

      expect(update.entered).toEqual([track.blocks[0]]);
      expect(cursor.activeSet.has(track.blocks[0])).toBe(true);
      expect(cursor.lastIndex).toBe(0);
    });

    it("exits exactly at the end time", () => {
      updateCursor(cursor, 7);
      const update = updateCursor(cursor, 10);

      expect(update.entered).toEqual([]);
      expect(update.exited).toEqual([track.blocks[0]]);
      expect(cursor.activeSet.size).toBe(0);
    });

    it("skips a block jumped over entirely but still moves past it", () => {
      const update = updateCursor(cursor, 12);

      expect(update.entered).toEqual([]);
      expect(update.exited).toEqual([]);
      expect(cursor.lastIndex).toBe(0);
    });
  });

  describe("monotonic sweep", () => {
    it("enters and exits each block once, in order", () => {
      const track = spans([
        [0, 1],
        [1, 2],
        [2, 3],
      ]);
      const [b0, b1, b2] = track.blocks;
      const cursor = createCursor(track);

      expect(updateCursor(cursor, 0.5)).toEqual({ entered: [b0], exited: [] });
      expect(updateCursor(cursor, 1.5)).toEqual({ entered: [b1], exited: [b0] });
      expect(updateCursor(cursor, 2.5)).toEqual({ entered: [b2], exited: [b1] });
      expect(updateCursor(cursor, 3.5)).toEqual({ entered: [], exited: [b2] });
      expect(cursor.lastIndex).toBe(2);
    });

    it("activates several overlapping blocks in one forward step", () => {
      const track = spans([
        [0, 4],
        [1, 4],
        [2, 2.5],
        [3, 5],
        [6, 7],
      ]);
      const cursor = createCursor(track);

      const update = updateCursor(cursor, 3);

      expect(update.entered).toEqual([track.blocks[0], track.blocks[1], track.blocks[3]]);
      expect(update.exited).toEqual([]);
      expect(cursor.lastIndex).toBe(3);
    });
  });

  describe("reverse sweep", () => {
    it("follows the start-time direction rule on the way back", () => {
      const track = spans([
        [0, 1],
        [1, 2],
        [2, 3],
      ]);
      const [b0, b1] = track.blocks;
      const cursor = createCursor(track);
      for (const t of [0.5, 1.5, 2.5, 3.5]) updateCursor(cursor, t);

      // Block 2 starts before 2.5, so the forward branch runs and finds nothing new
      expect(updateCursor(cursor, 2.5)).toEqual({ entered: [], exited: [] });
      expect(updateCursor(cursor, 1.5)).toEqual({ entered: [b1], exited: [] });
      expect(cursor.lastIndex).toBe(1);
      expect(updateCursor(cursor, 0.5)).toEqual({ entered: [b0], exited: [b1] });
      expect(cursor.lastIndex).toBe(0);
      expect(updateCursor(cursor, 0)).toEqual({ entered: [], exited: [] });
      expect(cursor.lastIndex).toBe(-1);
      expect(updateCursor(cursor, -1)).toEqual({ entered: [], exited: [b0] });

      expect(cursor.activeSet.size).toBe(0);
      expect(cursor.lastIndex).toBe(-1);
    });

    it("activates at most one block per backward step", () => {
      const track = spans([
        [0, 10],
        [1, 10],
        [2, 10],
        [8, 9],
      ]);
      const cursor = createCursor(track);
      // As if the playhead had last been somewhere past 8 with nothing sounding
      cursor.lastIndex = 3;

      const update = updateCursor(cursor, 5);

      expect(update.entered).toEqual([track.blocks[2]]);
      expect(cursor.lastIndex).toBe(2);
    });

    it("reports a block found in a gap as entered and exited in the same step", () => {
      const track = spans([
        [0, 1],
        [2, 3],
        [4, 5],
      ]);
      const cursor = createCursor(track);
      updateCursor(cursor, 4.5);

      const update = updateCursor(cursor, 3.5);

      expect(update.entered).toEqual([track.blocks[1]]);
      expect(update.exited).toEqual([track.blocks[2], track.blocks[1]]);
      expect(cursor.activeSet.size).toBe(0);
      expect(cursor.lastIndex).toBe(1);
    });
  });

  describe("idempotence", () => {
    it("emits nothing when updated twice at a time inside a block", () => {
      const track = spans([
        [0, 1],
        [1, 2],
      ]);
      const cursor = createCursor(track);

      expect(updateCursor(cursor, 1.5).entered).toEqual([track.blocks[1]]);
      expect(updateCursor(cursor, 1.5)).toEqual({ entered: [], exited: [] });
    });

    it("emits nothing when repeated at the start of a lone block", () => {
      const track = spans([[5, 10]]);
      const cursor = createCursor(track);
      updateCursor(cursor, 5);

      expect(updateCursor(cursor, 5)).toEqual({ entered: [], exited: [] });
      expect(updateCursor(cursor, 5)).toEqual({ entered: [], exited: [] });
      expect(cursor.activeSet.has(track.blocks[0])).toBe(true);
    });
  });

  describe("repeated time on a block start", () => {
    it("alternates between branches, re-reporting the ended block before it", () => {
      const track = spans([
        [0, 1],
        [2, 3],
      ]);
      const [b0, b1] = track.blocks;
      const cursor = createCursor(track);

      expect(updateCursor(cursor, 2)).toEqual({ entered: [b1], exited: [] });
      // Block 1 does not start before 2, so the backward branch picks up block 0
      expect(updateCursor(cursor, 2)).toEqual({ entered: [b0], exited: [b0] });
      expect(cursor.lastIndex).toBe(0);
      expect(updateCursor(cursor, 2)).toEqual({ entered: [], exited: [] });
      expect(cursor.lastIndex).toBe(1);
      expect(updateCursor(cursor, 2)).toEqual({ entered: [b0], exited: [b0] });
      expect(updateCursor(cursor, 2)).toEqual({ entered: [], exited: [] });
      expect([...cursor.activeSet]).toEqual([b1]);
    });
  });

  describe("zero-length blocks", () => {
    it("never remain in the active set, whichever way time moves", () => {
      const track = spans([
        [0, 3],
        [2, 2],
        [4, 5],
      ]);
      const zero = track.blocks[1];
      const cursor = createCursor(track);

      for (const t of [0, 1, 2, 2, 3, 4.5, 2, 1.9, 2, -1, 2, 6, 2]) {
        updateCursor(cursor, t);
        expect(cursor.activeSet.has(zero)).toBe(false);
      }
    });
  });

  describe("convergence with a full scan", () => {
    it("matches findActiveBlocks throughout forward playback with jumps", () => {
      const random = seededRandom(7);

      for (let run = 0; run < 20; run++) {
        const track = randomTrack(random, 40);
        const cursor = createCursor(track);
        let t = -1;

        for (let step = 0; step < 200; step++) {
          t += random() < 0.1 ? random() * 10 : random() * 0.1;
          updateCursor(cursor, t);

          expect(indicesOf(track, cursor.activeSet)).toEqual(
            indicesOf(track, findActiveBlocks(track, t))
          );
        }
      }
    });

    it("matches findActiveBlocks after resync at arbitrary times", () => {
      const random = seededRandom(11);
      const track = randomTrack(random, 60);
      const cursor = createCursor(track);

      for (let step = 0; step < 300; step++) {
        const t = random() * 100 - 5;
        resyncCursor(cursor, t);

        expect(indicesOf(track, cursor.activeSet)).toEqual(
          indicesOf(track, findActiveBlocks(track, t))
        );
      }
    });
  });

  describe("resyncCursor", () => {
    it("reports the difference and places lastIndex on the last started block", () => {
      const track = spans([
        [0, 1],
        [1, 2],
        [2, 3],
      ]);
      const [b0, b1, b2] = track.blocks;
      const cursor = createCursor(track);
      updateCursor(cursor, 2.5);

      expect(resyncCursor(cursor, 1.5)).toEqual({ entered: [b1], exited: [b2] });
      expect(cursor.lastIndex).toBe(1);
      expect(resyncCursor(cursor, 0)).toEqual({ entered: [b0], exited: [b1] });
      expect(cursor.lastIndex).toBe(0);
      expect(resyncCursor(cursor, -1)).toEqual({ entered: [], exited: [b0] });
      expect(cursor.lastIndex).toBe(-1);
    });

    it("continues forward normally afterwards", () => {
      const track = spans([
        [0, 1],
        [1, 2],
        [2, 3],
      ]);
      const cursor = createCursor(track);
      resyncCursor(cursor, 1.5);

      expect(updateCursor(cursor, 2.5)).toEqual({
        entered: [track.blocks[2]],
        exited: [track.blocks[1]],
      });
    });
  });

  describe("resetCursor", () => {
    it("returns the active blocks and rewinds", () => {
      const track = spans([
        [0, 2],
        [1, 3],
      ]);
      const cursor = createCursor(track);
      updateCursor(cursor, 1.5);

      expect(resetCursor(cursor)).toEqual([track.blocks[0], track.blocks[1]]);
      expect(cursor.lastIndex).toBe(-1);
      expect(cursor.activeSet.size).toBe(0);
    });
  });

  describe("classifyBlock", () => {
    const block = spans([[2, 4]]).blocks[0];

    it("classifies relative to the playhead", () => {
      expect(classifyBlock(block, 1)).toBe("upcoming");
      expect(classifyBlock(block, 2)).toBe("active");
      expect(classifyBlock(block, 4)).toBe("active");
      expect(classifyBlock(block, 4.5)).toBe("past");
    });
  });
});
