import type { MetricKey } from "../contracts/overview_report";

export const METRIC_LABELS: Record<MetricKey, string> = {
  version: "CP-SAT Version",
  workers: "Number of workers",
  status: "Status",
  walltime: "Time",
  presolve_time: "Presolve",
  variables: "Variables",
  constraints: "Constraints",
  model_type: "Type",
  objective: "Objective",
  best_bound: "Best bound",
  gap: "Gap",
};

export const METRIC_HELP: Record<MetricKey, string> = {
  version:
    "CP-SAT has seen significant performance improvements over the last years. Make sure to use the latest version.",
  workers:
    "CP-SAT has different parallelization tiers, triggered by the number of workers. More workers can improve performance.",
  status: [
    "CP-SAT can have 5 different statuses:",
    "- `UNKNOWN`: The solver timed out before finding a solution or proving infeasibility.",
    "- `OPTIMAL`: The solver found an optimal solution. This is the best possible status.",
    "- `FEASIBLE`: The solver found a feasible solution, but it is not guaranteed to be optimal.",
    "- `INFEASIBLE`: The solver proved that the problem is infeasible. This often indicates a bug in the model.",
    "- `MODEL_INVALID`: Definitely a bug. Should rarely happen.",
  ].join("\n"),
  walltime:
    "The total time spent by the solver. This includes the time spent in presolve and the time spent in the search.",
  presolve_time: "The time spent in presolve. This is usually a small fraction of the total time.",
  variables:
    "CP-SAT can handle (hundreds of) thousands of variables. This just gives a rough estimate of the size of the problem. Many variables may also be removed during presolve.",
  constraints:
    "CP-SAT can handle (hundreds of) thousands of constraints. More important than the number is the type of constraints. Some constraints are more expensive than others.",
  model_type: "Is the model an optimization or satisfaction model?",
  objective: "Value of the best solution found.",
  best_bound:
    "Bound on how good the best solution can be. If it matches the objective, the solution is optimal.",
  gap: "The gap is the difference between the objective and the best bound. The smaller the better. A gap of 0% means that the solution is optimal.",
};

export const SOLVED_BY_PRESOLVE_MESSAGE = "The model was solved by presolve.";

export const INCOMPLETE_LOG_GUIDANCE =
  "Log seems to be incomplete. Make sure you enter the full log without any modifications. The parser is sensitive to new lines.";
