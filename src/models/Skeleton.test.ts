import { describe, expect, it } from 'vitest';
import { BASE_POSE, pose, skeletonOf } from '../test-utils/climbFixtures';
import { Skeleton } from './Skeleton';

describe('Skeleton', () => {
  describe('positions and status', () => {
    it('reports lost for joints without samples', () => {
      const skeleton = skeletonOf({ leftWrist: { x: 0.1, y: 0.1 } });

      expect(skeleton.getStatus('leftWrist')).toBe('observed');
      expect(skeleton.getStatus('rightWrist')).toBe('lost');
      expect(skeleton.getPosition('rightWrist')).toBeNull();
    });

    it('treats held joints as usable but not observed', () => {
      const skeleton = new Skeleton(3, 0.3, {
        leftWrist: { frameIndex: 3, timestamp: 0.3, position: { x: 0.2, y: 0.2 }, status: 'held' },
        rightWrist: { frameIndex: 3, timestamp: 0.3, position: { x: 0.3, y: 0.2 }, status: 'observed' },
      });

      expect(skeleton.hasJoints('leftWrist', 'rightWrist')).toBe(true);
      expect(skeleton.isObserved('leftWrist', 'rightWrist')).toBe(false);
      expect(skeleton.getFrameIndex()).toBe(3);
      expect(skeleton.getTimestamp()).toBe(0.3);
    });
  });

  describe('centres', () => {
    it('computes hip and shoulder centres', () => {
      const skeleton = skeletonOf(BASE_POSE);

      expect(skeleton.getHipCenter()?.x).toBeCloseTo(0.5);
      expect(skeleton.getHipCenter()?.y).toBeCloseTo(0.5);
      expect(skeleton.getShoulderCenter()?.x).toBeCloseTo(0.5);
      expect(skeleton.getShoulderCenter()?.y).toBeCloseTo(0.3);
    });

    it('returns null when a hip is missing', () => {
      const skeleton = skeletonOf({ leftHip: { x: 0.4, y: 0.5 } });
      expect(skeleton.getHipCenter()).toBeNull();
    });
  });

  describe('torso deviation', () => {
    it('is zero for an upright torso', () => {
      expect(skeletonOf(BASE_POSE).getTorsoDeviation(0.05, 100)).toBeCloseTo(0);
    });

    it('measures lean from vertical', () => {
      const skeleton = skeletonOf(
        pose({
          leftShoulder: { x: 0.55, y: 0.4 },
          rightShoulder: { x: 0.65, y: 0.4 },
        })
      );
      // hip centre (0.5, 0.5) -> shoulder centre (0.6, 0.4)
      expect(skeleton.getTorsoDeviation(0.05, 100)).toBeCloseTo(45);
    });

    it('adds the depth penalty when hips are away from the wall', () => {
      const skeleton = skeletonOf(
        pose({
          leftHip: { x: 0.47, y: 0.5, z: 0.1 },
          rightHip: { x: 0.53, y: 0.5, z: 0.1 },
          leftShoulder: { x: 0.45, y: 0.3, z: 0 },
          rightShoulder: { x: 0.55, y: 0.3, z: 0 },
        })
      );
      expect(skeleton.getTorsoDeviation(0.05, 100)).toBeCloseTo(10);
    });

    it('ignores depth gaps under the threshold', () => {
      const skeleton = skeletonOf(
        pose({
          leftHip: { x: 0.47, y: 0.5, z: 0.02 },
          rightHip: { x: 0.53, y: 0.5, z: 0.02 },
          leftShoulder: { x: 0.45, y: 0.3, z: 0 },
          rightShoulder: { x: 0.55, y: 0.3, z: 0 },
        })
      );
      expect(skeleton.getTorsoDeviation(0.05, 100)).toBeCloseTo(0);
    });
  });

  describe('joint angles', () => {
    it('computes a right-angle elbow', () => {
      const skeleton = skeletonOf({
        leftShoulder: { x: 0.4, y: 0.3 },
        leftElbow: { x: 0.4, y: 0.4 },
        leftWrist: { x: 0.5, y: 0.4 },
      });
      expect(skeleton.getElbowAngle('left')).toBeCloseTo(90);
      expect(skeleton.getElbowAngle('right')).toBeNull();
    });

    it('keeps the base pose clear of the tension thresholds', () => {
      const skeleton = skeletonOf(BASE_POSE);
      expect(skeleton.getElbowAngle('left')).toBeGreaterThan(70);
      expect(skeleton.getShoulderAngle('right')).toBeLessThan(150);
      expect(skeleton.getKneeRotation('left')).toBeLessThan(25);
      expect(skeleton.getTorsoTwist()).toBeCloseTo(0);
    });

    it('folds torso twist into 0..90', () => {
      const skeleton = skeletonOf(
        pose({
          leftHip: { x: 0.5, y: 0.5 },
          rightHip: { x: 0.6, y: 0.6 },
        })
      );
      expect(skeleton.getTorsoTwist()).toBeCloseTo(45);
    });

    it('reports lateral sway as hip x minus shoulder x', () => {
      const skeleton = skeletonOf(
        pose({
          leftHip: { x: 0.5, y: 0.5 },
          rightHip: { x: 0.56, y: 0.5 },
        })
      );
      expect(skeleton.getLateralSway()).toBeCloseTo(0.03);
    });
  });
});
