import { createDebugLog } from "../debug";
import { IdmKinematics, type IdmParams, type IdmVehicle } from "./kinematics";
import type { KinematicsModel, Road } from "./road";
import { RoadNetwork } from "./roadNetwork";
import { createRng, normalizeSeed, type RandomFn } from "./rng";
import { SignalController } from "./signalController";
import { VehicleGenerator } from "./vehicleGenerator";
import type {
  ConflictTable,
  EngineDisplay,
  PointTuple,
  RoadEndpoints,
  RoadId,
  SignalCycle,
  SignalGroupsInput,
  SignalTiming,
  SimulationRun,
  TrafficVehicle,
  WeightedPathInput
} from "./types";

export const DEFAULT_DT_S = 1 / 60;
export const COLLISION_RADIUS = 3;
/** Ticks per `runInterval` block: three seconds at the default step. */
export const DEFAULT_INTERVAL_TICKS = 180;

const debugLog = createDebugLog("engine");

export interface EngineOptions {
  dt?: number;
  /** Vehicle generation cap; absent, zero or non-finite means unlimited. */
  maxGenerated?: number | null;
  collisionRadius?: number;
  seed?: number;
  rng?: RandomFn;
}

export class Engine<V extends TrafficVehicle = TrafficVehicle> implements SimulationRun {
  readonly dt: number;
  readonly maxGenerated: number | null;
  readonly collisionRadius: number;
  readonly network = new RoadNetwork<V>();
  readonly signals: SignalController[] = [];
  readonly generators: VehicleGenerator<V>[] = [];
  readonly kinematics: KinematicsModel<V>;
  scenarioName: string | null = null;

  private clock = 0;
  private collision = false;
  private generated = 0;
  private onMap = 0;
  private completedWaitSum = 0;
  private stopFlag = false;
  private display: EngineDisplay | null = null;
  private readonly nonEmpty = new Set<RoadId>();
  private readonly inbound = new Set<RoadId>();
  private readonly outbound = new Set<RoadId>();
  private readonly rng: RandomFn;

  constructor(kinematics: KinematicsModel<V>, options: EngineOptions = {}) {
    this.kinematics = kinematics;
    this.dt = positiveOr(options.dt, DEFAULT_DT_S);
    const cap = positiveOr(options.maxGenerated, 0);
    this.maxGenerated = cap > 0 ? Math.floor(cap) : null;
    this.collisionRadius = positiveOr(options.collisionRadius, COLLISION_RADIUS);
    this.rng = options.rng ?? createRng(normalizeSeed(options.seed));
  }

  get roads(): ReadonlyArray<Road<V>> {
    return this.network.roads;
  }

  addRoad(start: PointTuple, end: PointTuple): Road<V> {
    return this.network.addRoad(start, end);
  }

  addRoads(roads: ReadonlyArray<RoadEndpoints | readonly [PointTuple, PointTuple]>): Road<V>[] {
    return this.network.addRoads(roads);
  }

  addIntersections(table: ConflictTable): void {
    const missing = this.network.addIntersections(table);
    if (missing > 0) {
      debugLog(`${missing} conflict edges were one-directional in the input`);
    }
  }

  addSignal(groups: SignalGroupsInput, cycle: SignalCycle | null | undefined, timing: SignalTiming): SignalController {
    const controller = new SignalController(groups, cycle, timing);
    for (const group of controller.groups) {
      for (const roadId of group) {
        this.network.assertRoad(roadId, "signal group");
      }
    }
    controller.groups.forEach((group, groupIndex) => {
      for (const roadId of group) {
        this.network.roads[roadId].signal = { controller, group: groupIndex };
      }
    });
    this.signals.push(controller);
    return controller;
  }

  addGenerator(rate: number, paths: readonly WeightedPathInput[]): VehicleGenerator<V> {
    const generator = new VehicleGenerator<V>({
      rate,
      paths,
      roads: this.network.roads,
      kinematics: this.kinematics,
      rng: this.rng
    });
    generator.inboundRoads.forEach((id) => this.inbound.add(id));
    generator.outboundRoads.forEach((id) => this.outbound.add(id));
    this.generators.push(generator);
    return generator;
  }

  attachDisplay(display: EngineDisplay): void {
    this.display = display;
    display.update(this);
  }

  get time(): number {
    return this.clock;
  }

  get collisionDetected(): boolean {
    return this.collision;
  }

  get generatedCount(): number {
    return this.generated;
  }

  get onMapCount(): number {
    return this.onMap;
  }

  get completedCount(): number {
    return this.generated - this.onMap;
  }

  get nonEmptyRoads(): ReadonlySet<RoadId> {
    return this.nonEmpty;
  }

  get inboundRoads(): ReadonlySet<RoadId> {
    return this.inbound;
  }

  get outboundRoads(): ReadonlySet<RoadId> {
    return this.outbound;
  }

  /** Vehicles on the map that are on neither an inbound nor an outbound road. */
  get junctionVehicleCount(): number {
    let edgeVehicles = 0;
    for (const roadId of this.nonEmpty) {
      if (this.inbound.has(roadId) || this.outbound.has(roadId)) {
        edgeVehicles += this.network.roads[roadId].vehicles.length;
      }
    }
    return this.onMap - edgeVehicles;
  }

  get completed(): boolean {
    if (this.collision) {
      return true;
    }
    return this.maxGenerated !== null && this.generated >= this.maxGenerated && this.onMap === 0;
  }

  get stopRequested(): boolean {
    return this.stopFlag || (this.display?.closed ?? false);
  }

  requestStop(): void {
    this.stopFlag = true;
  }

  /**
   * Mean wait of finished journeys plus mean live wait of vehicles still on the map.
   * The two means are added, not pooled.
   */
  get averageWaitTime(): number {
    const completed = this.completedCount;
    const completedMean = completed > 0 ? this.completedWaitSum / completed : 0;
    let onMapMean = 0;
    if (this.onMap > 0) {
      let live = 0;
      for (const roadId of this.nonEmpty) {
        for (const vehicle of this.network.roads[roadId].vehicles) {
          live += vehicle.getWaitTime(this.clock);
        }
      }
      onMapMean = live / this.onMap;
    }
    return completedMean + onMapMean;
  }

  step(dt?: number): void {
    const delta = dt !== undefined && Number.isFinite(dt) && dt > 0 ? dt : this.dt;

    for (const controller of this.signals) {
      controller.update(delta);
    }

    for (const roadId of Array.from(this.nonEmpty)) {
      this.kinematics.advance(this.network.roads[roadId], delta, this.clock);
    }

    for (const generator of this.generators) {
      if (this.maxGenerated !== null && this.generated >= this.maxGenerated) {
        break;
      }
      const roadId = generator.update(this.clock, this.generated);
      if (roadId !== null) {
        this.generated += 1;
        this.onMap += 1;
        this.nonEmpty.add(roadId);
      }
    }

    this.transferVehicles();

    if (!this.collision) {
      const hit = this.network.findCollision(this.nonEmpty, this.collisionRadius);
      if (hit) {
        this.collision = true;
        debugLog(
          `collision at t=${this.clock.toFixed(2)}s between vehicle ${hit.vehicleId} (road ${hit.roadId}) ` +
            `and vehicle ${hit.otherVehicleId} (road ${hit.otherRoadId})`
        );
      }
    }

    this.clock += delta;

    this.display?.update(this);
  }

  /** Runs up to `ticks` steps, halting on completion or a stop request. */
  run(ticks: number): number {
    let executed = 0;
    for (let i = 0; i < ticks; i += 1) {
      if (this.completed || this.stopRequested) {
        break;
      }
      this.step();
      executed += 1;
    }
    return executed;
  }

  /** Optionally forces every controller to its next phase, then runs one block of ticks. */
  runInterval(forceAdvance = false, ticks = DEFAULT_INTERVAL_TICKS): number {
    if (forceAdvance) {
      for (const controller of this.signals) {
        controller.update();
      }
      this.display?.update(this);
    }
    return this.run(ticks);
  }

  private transferVehicles(): void {
    const becameEmpty: RoadId[] = [];
    const becameBusy: RoadId[] = [];

    for (const roadId of Array.from(this.nonEmpty)) {
      const road = this.network.roads[roadId];
      const lead = road.front;
      if (!lead) {
        becameEmpty.push(roadId);
        continue;
      }
      if (lead.progress < road.length) {
        continue;
      }
      road.vehicles.shift();
      if (lead.roadIndex + 1 < lead.path.length) {
        lead.progress = 0;
        lead.roadIndex += 1;
        const nextId = lead.path[lead.roadIndex];
        this.network.roads[nextId].vehicles.push(lead);
        becameBusy.push(nextId);
      } else {
        this.onMap -= 1;
        this.completedWaitSum += lead.getWaitTime(this.clock);
      }
      if (road.vehicles.length === 0) {
        becameEmpty.push(roadId);
      }
    }

    for (const roadId of becameEmpty) {
      this.nonEmpty.delete(roadId);
    }
    for (const roadId of becameBusy) {
      this.nonEmpty.add(roadId);
    }
  }
}

function positiveOr(value: number | null | undefined, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : fallback;
}

export interface IdmEngineOptions extends EngineOptions {
  idm?: Partial<IdmParams>;
}

export function createIdmEngine(options: IdmEngineOptions = {}): Engine<IdmVehicle> {
  return new Engine<IdmVehicle>(new IdmKinematics(options.idm), options);
}
