import { registerSchema } from "../../src";

// Parameter and both moments are updated in place so tensor identity survives
// the step.
registerSchema("Adam")
  .setInputCount(6)
  .setOutputCount(3)
  .enforceInplace([
    [0, 0],
    [1, 1],
    [2, 2],
  ])
  .identicalTypeAndShape()
  .setDoc(
    "Applies one Adam step to a parameter given its gradient, learning rate and iteration count.",
  )
  .describeArgument("beta1", "Decay of the first moment estimate. Defaults to 0.9.")
  .describeArgument("beta2", "Decay of the second moment estimate. Defaults to 0.999.")
  .describeArgument("epsilon", "Added to the denominator. Defaults to 1e-5.")
  .describeInput(0, "param", "Parameter to update.")
  .describeInput(1, "moment_1", "First moment estimate.")
  .describeInput(2, "moment_2", "Second moment estimate.")
  .describeInput(3, "grad", "Gradient of the parameter.")
  .describeInput(4, "lr", "Learning rate.")
  .describeInput(5, "iter", "Iteration number.")
  .describeOutput(0, "output_param", "Updated parameter.")
  .describeOutput(1, "output_moment_1", "Updated first moment.")
  .describeOutput(2, "output_moment_2", "Updated second moment.");
