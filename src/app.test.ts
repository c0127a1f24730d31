import request from "supertest";
import { describe, expect, it } from "vitest";
import { createApp } from "./app";
import { heuristicPredictor } from "./services/heuristicPredictor.service";
import { sampleBody } from "./test/fixtures";
import { REQUIRED_PARAMETERS, WELCOME_MESSAGE } from "./utils/constants";

const app = createApp(heuristicPredictor);

describe("GET /", () => {
  it("returns the welcome message", async () => {
    const res = await request(app).get("/");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ message: WELCOME_MESSAGE });
  });
});

describe("GET /health", () => {
  it("reports the active predictor", async () => {
    const res = await request(app).get("/health");

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      success: true,
      environment: "test",
      predictor: "heuristic",
    });
  });
});

describe("POST /predict", () => {
  it("returns predictions and plans", async () => {
    const res = await request(app)
      .post("/predict")
      .send({ ...sampleBody(), user_allergy: "Nuts", user_goal: "Muscle-Gain" });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      PredictedDiet: "1800 kcal per day",
      PredictedWorkout: "4 workout days per week",
      MealPlan: [
        {
          Meal: "Breakfast",
          Food: "Whole Wheat Toast",
          Calories: "350 kcal",
          AllergySafe: true,
        },
        {
          Meal: "Lunch",
          Food: "Tofu + Salad",
          Calories: "600 kcal",
          AllergySafe: true,
        },
        {
          Meal: "Dinner",
          Food: "Lentil Soup + Rice",
          Calories: "500 kcal",
          AllergySafe: true,
        },
      ],
      WorkoutPlan: [
        {
          Exercise: "Bench Press",
          Type: "Strength",
          "Reps/Sets": "4 sets x 8 reps",
          CaloriesBurned: "250 kcal",
        },
        {
          Exercise: "Deadlifts",
          Type: "Strength",
          "Reps/Sets": "4 sets x 6 reps",
          CaloriesBurned: "300 kcal",
        },
      ],
    });
  });

  it.each(REQUIRED_PARAMETERS)("returns 400 when %s is missing", async (param) => {
    const body: Record<string, unknown> = { ...sampleBody() };
    delete body[param];

    const res = await request(app).post("/predict").send(body);

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: `Missing parameter: '${param}'` });
  });

  it("names only the first missing parameter", async () => {
    const res = await request(app).post("/predict").send({ age: 30 });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: "Missing parameter: 'gender'" });
  });

  it("returns an empty workout plan for an unrecognized goal", async () => {
    const res = await request(app)
      .post("/predict")
      .send({ ...sampleBody(), user_goal: "flexibility" });

    expect(res.status).toBe(200);
    expect(res.body.WorkoutPlan).toEqual([]);
  });

  it("produces identical output for identical input", async () => {
    const body = { ...sampleBody(), user_allergy: "nut" };

    const first = await request(app).post("/predict").send(body);
    const second = await request(app).post("/predict").send(body);

    expect(second.text).toBe(first.text);
  });

  it("keeps the integer pattern for a very large bmr", async () => {
    const res = await request(app)
      .post("/predict")
      .send({ ...sampleBody(), bmr_kcal: 1e21 });

    expect(res.status).toBe(200);
    expect(res.body.PredictedDiet).toBe("1200000000000000000000 kcal per day");
    expect(res.body.PredictedDiet).toMatch(/^-?\d+ kcal per day$/);
  });

  it("rejects a boolean reading as a server error", async () => {
    const res = await request(app)
      .post("/predict")
      .send({ ...sampleBody(), activity_level: true });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal Server Error" });
  });

  it("fails a reading of the wrong type as a server error", async () => {
    const res = await request(app)
      .post("/predict")
      .send({ ...sampleBody(), age: "thirty" });

    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Internal Server Error" });
  });

  it("treats a null reading as present but invalid", async () => {
    const res = await request(app)
      .post("/predict")
      .send({ ...sampleBody(), bmi: null });

    expect(res.status).toBe(500);
  });

  it("rejects malformed JSON with a client error", async () => {
    const res = await request(app)
      .post("/predict")
      .set("Content-Type", "application/json")
      .send('{"age": 30,');

    expect(res.status).toBe(400);
    expect(typeof res.body.error).toBe("string");
  });
});

describe("unknown routes", () => {
  it("returns 404", async () => {
    const res = await request(app).get("/predictions");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: "Not Found" });
  });

  it("does not serve GET on /predict", async () => {
    const res = await request(app).get("/predict");

    expect(res.status).toBe(404);
  });
});
