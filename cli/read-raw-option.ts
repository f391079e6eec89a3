/**
 * Collect the values given to a flag exactly as typed.
 *
 * The argument parser converts number-like values, so `--tag 1.10` arrives as
 * `1.1` and `--tag 007` as `7`. Versions, tags and platforms are read from
 * the raw arguments instead, in both `--flag value` and `--flag=value` form.
 * Arguments after `--` are ignored.
 *
 * @param argv - Raw process arguments.
 * @param flag - Flag including its dashes, e.g. `--tag`.
 * @returns Values in the order given.
 */
export function readRawOption(argv: readonly string[], flag: string): string[] {
  let values: string[] = []
  let prefix = `${flag}=`

  for (let index = 0; index < argv.length; index++) {
    let argument = argv[index]
    if (argument === undefined || argument === '--') {
      break
    }
    if (argument === flag) {
      let value = argv[index + 1]
      if (value !== undefined) {
        values.push(value)
        index++
      }
    } else if (argument.startsWith(prefix)) {
      values.push(argument.slice(prefix.length))
    }
  }

  return values
}
