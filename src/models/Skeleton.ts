import type { JointName, JointSample, Point, SampleStatus, Side } from '../types/pose';
import { sideJoint } from '../types/pose';
import { angleAt, angleBetween, midpoint } from '../utils/math';

/**
 * One buffered frame viewed across joints.
 *
 * Positions come from JointSamples, so a held joint reports its carried
 * position and a lost joint reports null. Derived points are computed lazily
 * and cached.
 *
 * ORIENTATION REFERENCE:
 * - y grows downward, so "up the wall" is -y
 * - Torso deviation: angle between hip-centre -> shoulder-centre and straight up.
 *   0° = torso parallel to the wall and upright
 * - Depth (z), when every torso point has it, adds a penalty for hips pushed
 *   away from the wall
 */
export class Skeleton {
  private _hipCenter: Point | null | undefined;
  private _shoulderCenter: Point | null | undefined;

  constructor(
    private readonly frameIndex: number,
    private readonly timestamp: number,
    private readonly samples: Partial<Record<JointName, JointSample>>
  ) {}

  getFrameIndex(): number {
    return this.frameIndex;
  }

  getTimestamp(): number {
    return this.timestamp;
  }

  getStatus(joint: JointName): SampleStatus {
    return this.samples[joint]?.status ?? 'lost';
  }

  getPosition(joint: JointName): Point | null {
    return this.samples[joint]?.position ?? null;
  }

  /**
   * True when every named joint has a usable (observed or held) position.
   */
  hasJoints(...joints: JointName[]): boolean {
    return joints.every((joint) => this.getPosition(joint) !== null);
  }

  /**
   * True when every named joint was actually observed this frame.
   */
  isObserved(...joints: JointName[]): boolean {
    return joints.every((joint) => this.getStatus(joint) === 'observed');
  }

  getMidpoint(a: JointName, b: JointName): Point | null {
    const pa = this.getPosition(a);
    const pb = this.getPosition(b);
    if (!pa || !pb) return null;
    return midpoint(pa, pb);
  }

  /**
   * Hip centre, used as the centre-of-mass proxy.
   */
  getHipCenter(): Point | null {
    if (this._hipCenter === undefined) {
      this._hipCenter = this.getMidpoint('leftHip', 'rightHip');
    }
    return this._hipCenter;
  }

  getShoulderCenter(): Point | null {
    if (this._shoulderCenter === undefined) {
      this._shoulderCenter = this.getMidpoint('leftShoulder', 'rightShoulder');
    }
    return this._shoulderCenter;
  }

  /**
   * Angle at `vertex` (degrees), or null if any point is missing.
   */
  getAngle(point1: JointName, vertex: JointName, point2: JointName): number | null {
    const p1 = this.getPosition(point1);
    const v = this.getPosition(vertex);
    const p2 = this.getPosition(point2);
    if (!p1 || !v || !p2) return null;
    return angleAt(p1, v, p2);
  }

  /** Shoulder-elbow-wrist */
  getElbowAngle(side: Side): number | null {
    return this.getAngle(
      sideJoint(side, 'Shoulder'),
      sideJoint(side, 'Elbow'),
      sideJoint(side, 'Wrist')
    );
  }

  /** Hip-shoulder-elbow; near 180° when the arm hangs straight overhead */
  getShoulderAngle(side: Side): number | null {
    return this.getAngle(
      sideJoint(side, 'Hip'),
      sideJoint(side, 'Shoulder'),
      sideJoint(side, 'Elbow')
    );
  }

  /**
   * How far the knee leaves the hip-ankle line, measured at the hip.
   */
  getKneeRotation(side: Side): number | null {
    return this.getAngle(
      sideJoint(side, 'Ankle'),
      sideJoint(side, 'Hip'),
      sideJoint(side, 'Knee')
    );
  }

  /**
   * Angle between the shoulder line and the hip line, folded into [0, 90].
   */
  getTorsoTwist(): number | null {
    const ls = this.getPosition('leftShoulder');
    const rs = this.getPosition('rightShoulder');
    const lh = this.getPosition('leftHip');
    const rh = this.getPosition('rightHip');
    if (!ls || !rs || !lh || !rh) return null;
    const angle = angleBetween(
      { x: rs.x - ls.x, y: rs.y - ls.y },
      { x: rh.x - lh.x, y: rh.y - lh.y }
    );
    if (angle === null) return null;
    return angle > 90 ? 180 - angle : angle;
  }

  /**
   * Torso deviation from upright in the image plane (degrees), plus the
   * depth penalty when all four torso points carry z.
   */
  getTorsoDeviation(depthThreshold: number, depthPenalty: number): number | null {
    const hip = this.getHipCenter();
    const shoulder = this.getShoulderCenter();
    if (!hip || !shoulder) return null;

    const angle = angleBetween(
      { x: shoulder.x - hip.x, y: shoulder.y - hip.y },
      { x: 0, y: -1 }
    );
    if (angle === null) return null;

    if (hip.z !== undefined && shoulder.z !== undefined) {
      const depthGap = Math.abs(hip.z - shoulder.z);
      if (depthGap > depthThreshold) {
        return angle + depthGap * depthPenalty;
      }
    }
    return angle;
  }

  /**
   * Signed horizontal offset of the hips from the shoulders.
   */
  getLateralSway(): number | null {
    const hip = this.getHipCenter();
    const shoulder = this.getShoulderCenter();
    if (!hip || !shoulder) return null;
    return hip.x - shoulder.x;
  }
}
