export { TicTacToeModule } from "./rules";
export { TicTacToeUI } from "./ui";
