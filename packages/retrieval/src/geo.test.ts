import { describe, expect, it } from "vitest";

import {
  CLUSTER_STEP_DEGREES,
  boundingBox,
  clusterCell,
  clusterKey,
  distanceKm,
  isInBoundingBox,
  isWithinRadius
} from "./geo.js";

const mumbai = { latitude: 19.076, longitude: 72.8777 };
const pune = { latitude: 18.5204, longitude: 73.8567 };

describe("distanceKm", () => {
  it("returns zero for identical points", () => {
    expect(distanceKm(mumbai, mumbai)).toBe(0);
  });

  it("matches the haversine distance between two cities", () => {
    expect(distanceKm(mumbai, pune)).toBeCloseTo(120.152, 2);
  });

  it("is symmetric", () => {
    expect(distanceKm(pune, mumbai)).toBeCloseTo(distanceKm(mumbai, pune), 10);
  });

  it("measures one degree of longitude at the equator", () => {
    expect(
      distanceKm({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 })
    ).toBeCloseTo(111.195, 2);
  });
});

describe("clusterCell", () => {
  it("uses a step of roughly 0.8993 degrees", () => {
    expect(CLUSTER_STEP_DEGREES).toBeCloseTo(0.89932, 5);
  });

  it("builds the key from rounded lat/lon indices", () => {
    expect(clusterKey(mumbai.latitude, mumbai.longitude)).toBe("21_81");
    expect(clusterKey(28.6139, 77.209)).toBe("32_86");
  });

  it("places nearby points in the same cell", () => {
    expect(clusterCell({ latitude: 19.1, longitude: 72.9 }).key).toBe(
      clusterCell(mumbai).key
    );
  });

  it("never produces a negative-zero index", () => {
    expect(clusterKey(51.5074, -0.1278)).toBe("57_0");
    expect(clusterKey(-0.1, -0.1)).toBe("0_0");
  });

  it("assigns a point on a cell edge to exactly one cell", () => {
    const edge = CLUSTER_STEP_DEGREES / 2;
    expect(clusterKey(edge, edge)).toBe("1_1");
    expect(clusterKey(-edge, -edge)).toBe("0_0");
  });

  it("uses the cell center as the representative coordinate", () => {
    const cell = clusterCell(mumbai);
    expect(cell.latIndex).toBe(21);
    expect(cell.lonIndex).toBe(81);
    expect(cell.center.latitude).toBeCloseTo(21 * CLUSTER_STEP_DEGREES, 10);
    expect(cell.center.longitude).toBeCloseTo(81 * CLUSTER_STEP_DEGREES, 10);
  });
});

describe("boundingBox", () => {
  it("contains every point inside the radius", () => {
    const box = boundingBox(mumbai, 10);
    const inside = { latitude: 19.1, longitude: 72.9 };
    expect(isWithinRadius(mumbai, inside, 10)).toBe(true);
    expect(isInBoundingBox(box, inside)).toBe(true);
  });

  it("excludes points far outside the radius", () => {
    const box = boundingBox(mumbai, 10);
    expect(isInBoundingBox(box, pune)).toBe(false);
  });

  it("opens the longitude span across the antimeridian", () => {
    const box = boundingBox({ latitude: 0, longitude: 179.9 }, 50);
    expect(box.minLongitude).toBe(-180);
    expect(box.maxLongitude).toBe(180);
  });

  it("clamps latitude at the poles", () => {
    const box = boundingBox({ latitude: 89.9, longitude: 0 }, 50);
    expect(box.maxLatitude).toBe(90);
    expect(box.minLongitude).toBe(-180);
  });
});
