export const USAGE = `Usage
  Enter an expression and press Enter. Every result is saved as a variable
  that later expressions can use directly. To name a variable yourself, use
  the '=' operator: '$my_variable = 1 + 1'. To store text without
  evaluating it, use '<=': '$rate <= 60 miles per hour'.

Commands
  help            Shows this message.
  list            Shows the contents of memory and the saved memory files.
  delete $var     Deletes the named variable.
  delete all      Deletes all variables in memory.
  save [name]     Saves the contents of memory to a file.
  restore [name]  Restores the contents of memory from a file.
  clear           Clears the screen.
  quit            Quits the program.

Expressions
  2 ^ 10 / 3              Arithmetic, with ^ for powers and ! for factorials
  3 feet + 2 inches       Quantities with units
  60 mph in km/h          Unit conversion with 'in' or 'to'
  255 in hex              Integers in hex, binary or octal
  sqrt($1) * pi           Functions, constants and variables

Special Variables
  $_              Result of the last expression.
`;
