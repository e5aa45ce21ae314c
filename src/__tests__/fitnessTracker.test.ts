import FitnessTracker, { SAMPLE_PACKAGES } from "../fitnessTracker";
import * as formulas from "../formulas";
import { InvalidPackageError, UnknownActivityError } from "../shared/errors";
import { TrainingPackage } from "../shared/types";

const SWIMMING_LINE =
  "Тип тренировки: Swimming; Длительность: 1.000 ч.; Дистанция: 0.994 км; " +
  "Ср. скорость: 1.000 км/ч; Потрачено ккал: 336.000.";
const RUNNING_LINE =
  "Тип тренировки: Running; Длительность: 1.000 ч.; Дистанция: 9.750 км; " +
  "Ср. скорость: 9.750 км/ч; Потрачено ккал: 797.805.";
const WALKING_LINE =
  "Тип тренировки: SportsWalking; Длительность: 1.000 ч.; Дистанция: 5.850 км; " +
  "Ср. скорость: 5.850 км/ч; Потрачено ккал: 349.252.";

describe("FitnessTracker", () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("processPackage", () => {
    it("should summarize a running package", () => {
      const tracker = new FitnessTracker();
      const outcome = tracker.processPackage("RUN", [15000, 1, 75]);

      expect(outcome.status).toBe("completed");
      expect(outcome.message).toBe(RUNNING_LINE);
    });

    it("should summarize a walking package", () => {
      expect(new FitnessTracker().processPackage("WLK", [9000, 1, 75, 180]).message).toBe(WALKING_LINE);
    });

    it("should summarize a swimming package", () => {
      expect(new FitnessTracker().processPackage("SWM", [720, 1, 80, 25, 40]).message).toBe(SWIMMING_LINE);
    });

    it("should reject an unknown activity", () => {
      const outcome = new FitnessTracker().processPackage("XYZ", [1, 2, 3]);

      expect(outcome.status).toBe("rejected");
      expect(outcome.message).toBe("Неизвестная тренировка.");
      if (outcome.status === "rejected") {
        expect(outcome.error).toBeInstanceOf(UnknownActivityError);
      }
    });

    it("should reject a short package", () => {
      const outcome = new FitnessTracker().processPackage("RUN", [15000, 1]);

      expect(outcome.status).toBe("rejected");
      expect(outcome.message).toBe("Некорректный пакет данных.");
      if (outcome.status === "rejected") {
        expect(outcome.error).toBeInstanceOf(InvalidPackageError);
      }
    });

    it("should rethrow errors that are not package rejections", () => {
      jest.spyOn(formulas, "computeSummary").mockImplementation(() => {
        throw new RangeError("unexpected");
      });

      expect(() => new FitnessTracker().processPackage("RUN", [15000, 1, 75])).toThrow(RangeError);
    });

    it("should produce identical output for identical input", () => {
      const tracker = new FitnessTracker();
      const first = tracker.processPackage("WLK", [9000, 1, 75, 180]);
      const second = tracker.processPackage("WLK", [9000, 1, 75, 180]);

      expect(second.message).toBe(first.message);
    });
  });

  describe("run", () => {
    it("should print the sample packages in order", () => {
      const outcomes = new FitnessTracker().run(SAMPLE_PACKAGES);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(["completed", "completed", "completed"]);
      expect(logSpy.mock.calls).toEqual([[SWIMMING_LINE], [RUNNING_LINE], [WALKING_LINE]]);
    });

    it("should print rejections in place and keep going", () => {
      const packages: TrainingPackage[] = [
        ["XYZ", [1, 2, 3]],
        ["RUN", [15000, 1]],
        ["RUN", [15000, 1, 75]],
      ];

      const outcomes = new FitnessTracker().run(packages);

      expect(outcomes.map((outcome) => outcome.status)).toEqual(["rejected", "rejected", "completed"]);
      expect(logSpy.mock.calls).toEqual([
        ["Неизвестная тренировка."],
        ["Некорректный пакет данных."],
        [RUNNING_LINE],
      ]);
      expect(errorSpy).not.toHaveBeenCalled();
    });

    it("should stop at the first rejection in fail-fast mode", () => {
      const tracker = new FitnessTracker({ failFast: true, verbose: false });
      const packages: TrainingPackage[] = [
        ["RUN", [15000, 1, 75]],
        ["WLK", [9000, 1, null, 180]],
        ["SWM", [720, 1, 80, 25, 40]],
      ];

      expect(() => tracker.run(packages)).toThrow(InvalidPackageError);
      expect(logSpy.mock.calls).toEqual([[RUNNING_LINE]]);
    });

    it("should log progress and rejection reasons in verbose mode", () => {
      const tracker = new FitnessTracker({ failFast: false, verbose: true });

      tracker.run([["RUN", [15000, 1]], ["RUN", [15000, 1, 75]]]);

      expect(logSpy).toHaveBeenCalledWith("🏃 Fitness Tracker");
      expect(logSpy).toHaveBeenCalledWith("📦 Processing 2 package(s)\n");
      expect(logSpy).toHaveBeenCalledWith("\n✅ Processed 1 package(s), 1 rejected");
      expect(errorSpy).toHaveBeenCalledWith("❌ Package RUN rejected (expected 3 values, got 2)");
    });

    it("should return no outcomes for an empty list", () => {
      expect(new FitnessTracker().run([])).toEqual([]);
      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
