import { describe, it, expect } from 'vitest';
import {
  projectX,
  projectY,
  project,
  unproject,
  projectToMercator,
  worldSize,
  worldToPixel,
  worldToTile,
  tileToWorld,
} from '../../src/geometry/project.js';
import { tileAddress } from '../../src/address.js';

describe('project', () => {
  describe('projectX', () => {
    it('should project longitude 0 to 0.5', () => {
      expect(projectX(0)).toBeCloseTo(0.5, 10);
    });

    it('should project longitude -180 to 0', () => {
      expect(projectX(-180)).toBeCloseTo(0, 10);
    });

    it('should project longitude 90 to 0.75', () => {
      expect(projectX(90)).toBeCloseTo(0.75, 10);
    });

    it('should project longitude -90 to 0.25', () => {
      expect(projectX(-90)).toBeCloseTo(0.25, 10);
    });
  });

  describe('projectY', () => {
    it('should project latitude 0 to 0.5', () => {
      expect(projectY(0)).toBeCloseTo(0.5, 10);
    });

    it('should project positive latitudes to < 0.5 (north is up)', () => {
      expect(projectY(45)).toBeLessThan(0.5);
    });

    it('should project negative latitudes to > 0.5 (south is down)', () => {
      expect(projectY(-45)).toBeGreaterThan(0.5);
    });

    it('should be monotonically decreasing in latitude', () => {
      let previous = projectY(-80);
      for (let lat = -70; lat <= 80; lat += 10) {
        const y = projectY(lat);
        expect(y).toBeLessThan(previous);
        previous = y;
      }
    });
  });

  describe('project / unproject', () => {
    it('should project a mid-latitude position', () => {
      const p = project(47.6386, 6.8631);
      expect(p.x).toBeCloseTo(0.519064, 6);
      expect(p.y).toBeCloseTo(0.349109, 6);
    });

    it('should recover the position with unproject', () => {
      const ll = unproject(project(47.6386, 6.8631));
      expect(ll.lat).toBeCloseTo(47.6386, 9);
      expect(ll.lon).toBeCloseTo(6.8631, 9);
    });

    it('should unproject the world center to (0, 0)', () => {
      const ll = unproject({ x: 0.5, y: 0.5 });
      expect(ll.lat).toBeCloseTo(0, 10);
      expect(ll.lon).toBeCloseTo(0, 10);
    });
  });

  describe('projectToMercator', () => {
    it('should project coordinates in-place', () => {
      const xy = new Float64Array([-0.1, 51.5]);
      projectToMercator(xy);

      expect(xy[0]).toBeCloseTo(0.49972, 4);
      expect(xy[1]).toBeLessThan(0.5);
      expect(xy[1]).toBeGreaterThan(0.3);
    });

    it('should handle multiple coordinate pairs', () => {
      const xy = new Float64Array([0, 0, 90, 0, -180, 0]);
      projectToMercator(xy);

      expect(xy[0]).toBeCloseTo(0.5, 10);
      expect(xy[1]).toBeCloseTo(0.5, 10);
      expect(xy[2]).toBeCloseTo(0.75, 10);
      expect(xy[3]).toBeCloseTo(0.5, 10);
      expect(xy[4]).toBeCloseTo(0.0, 10);
      expect(xy[5]).toBeCloseTo(0.5, 10);
    });
  });

  describe('worldSize / worldToPixel', () => {
    it('should scale by 2^zoom * tileSize', () => {
      expect(worldSize(0)).toBe(256);
      expect(worldSize(3)).toBe(2048);
      expect(worldSize(3, 512)).toBe(4096);
    });

    it('should convert a world point to absolute pixels', () => {
      expect(worldToPixel({ x: 0.25, y: 0.5 }, 2)).toEqual({ x: 256, y: 512 });
    });
  });

  describe('worldToTile', () => {
    it('should locate a point and its offset inside the tile', () => {
      const pos = worldToTile({ x: 0.3, y: 0.2 }, 3);
      expect(pos.zoom).toBe(3);
      expect(pos.col).toBe(2);
      expect(pos.row).toBe(1);
      expect(pos.offsetX).toBeCloseTo(102.4, 6);
      expect(pos.offsetY).toBeCloseTo(153.6, 6);
    });

    it('should put the world origin in tile 0/0 at offset 0', () => {
      expect(worldToTile({ x: 0, y: 0 }, 5)).toEqual({
        zoom: 5, col: 0, row: 0, offsetX: 0, offsetY: 0,
      });
    });

    it('should honour a custom tile size', () => {
      const pos = worldToTile({ x: 0.5, y: 0.5 }, 1, 512);
      expect(pos).toEqual({ zoom: 1, col: 1, row: 1, offsetX: 0, offsetY: 0 });
    });
  });

  describe('tileToWorld', () => {
    it('should return the north-west corner of a bare address', () => {
      expect(tileToWorld(tileAddress(2, 1, 3))).toEqual({ x: 0.25, y: 0.75 });
    });

    it('should invert worldToTile', () => {
      const point = { x: 0.3, y: 0.2 };
      const back = tileToWorld(worldToTile(point, 3));
      expect(back.x).toBeCloseTo(point.x, 12);
      expect(back.y).toBeCloseTo(point.y, 12);
    });

    it('should reject an out-of-range address', () => {
      expect(() => tileToWorld({ zoom: 2, col: 4, row: 0 })).toThrow(RangeError);
    });
  });
});
