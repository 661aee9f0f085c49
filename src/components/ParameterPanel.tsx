import type { ParameterInput } from "../core/params/parameterValues";
import type { ParameterDeclaration } from "../core/params/types";
import { applyHexColor, vectorToHexColor } from "../utils/colorHex";

interface ParameterPanelProps {
  parameters: ParameterDeclaration[];
  onChange: (name: string, value: ParameterInput) => void;
  onReset: () => void;
}

export function ParameterPanel(props: ParameterPanelProps): JSX.Element {
  if (props.parameters.length === 0) {
    return <p className="parameter-panel-empty">This effect has no parameters.</p>;
  }
  return (
    <div className="parameter-panel">
      {props.parameters.map((parameter) => (
        <ParameterControl
          key={parameter.name}
          parameter={parameter}
          onChange={(value) => props.onChange(parameter.name, value)}
        />
      ))}
      <button type="button" className="parameter-reset" onClick={props.onReset}>
        Reset to defaults
      </button>
    </div>
  );
}

interface ParameterControlProps {
  parameter: ParameterDeclaration;
  onChange: (value: ParameterInput) => void;
}

function ParameterControl(props: ParameterControlProps): JSX.Element {
  const { parameter } = props;
  const { label, value } = parameter;

  switch (parameter.kind) {
    case "toggle":
      return (
        <div className="parameter-row">
          <label className="parameter-switch">
            <input
              type="checkbox"
              checked={value[0] > 0.5}
              aria-label={label}
              onChange={(event) => props.onChange(event.target.checked)}
            />
            <span className="parameter-label">{label}</span>
          </label>
        </div>
      );

    case "enum":
      if (parameter.enumLabels.length === 0) {
        return (
          <div className="parameter-row">
            <span className="parameter-label">{label}</span>
            <input
              type="number"
              aria-label={label}
              min={parameter.min}
              max={parameter.max}
              step={1}
              value={value[0]}
              onChange={(event) => props.onChange(Number(event.target.value))}
            />
          </div>
        );
      }
      return (
        <div className="parameter-row">
          <span className="parameter-label">{label}</span>
          <select
            aria-label={label}
            value={String(Math.round(value[0]))}
            onChange={(event) => props.onChange(Number(event.target.value))}
          >
            {parameter.enumLabels.map((option, index) => (
              <option key={`${parameter.name}-${index}`} value={String(index)}>
                {option}
              </option>
            ))}
          </select>
        </div>
      );

    case "color":
      return (
        <div className="parameter-group">
          <div className="parameter-row">
            <span className="parameter-label">{label}</span>
            <input
              type="color"
              aria-label={`${label} color`}
              value={vectorToHexColor(value)}
              onChange={(event) => {
                const next = applyHexColor(value, event.target.value);
                if (next !== null) {
                  props.onChange(next);
                }
              }}
            />
          </div>
          <div className="parameter-row compact">
            <span className="parameter-axis">a</span>
            <input
              type="range"
              aria-label={`${label} alpha`}
              min={parameter.min}
              max={parameter.max}
              step={parameter.step}
              value={value[3]}
              onChange={(event) => props.onChange([value[0], value[1], value[2], Number(event.target.value)])}
            />
          </div>
        </div>
      );

    case "point2d":
      return (
        <div className="parameter-group">
          <span className="parameter-label">{label}</span>
          {(["x", "y"] as const).map((axis, index) => (
            <div className="parameter-row compact" key={`${parameter.name}-${axis}`}>
              <span className="parameter-axis">{axis}</span>
              <input
                type="range"
                aria-label={`${label} ${axis}`}
                min={parameter.min}
                max={parameter.max}
                step={parameter.step}
                value={value[index]}
                onChange={(event) => {
                  const next = [value[0], value[1]];
                  next[index] = Number(event.target.value);
                  props.onChange(next);
                }}
              />
            </div>
          ))}
        </div>
      );

    case "trigger":
      return (
        <div className="parameter-row">
          <span className="parameter-label">{label}</span>
          <button type="button" aria-label={`Fire ${label}`} onClick={() => props.onChange(1)}>
            Fire
          </button>
        </div>
      );

    case "scalar":
      return (
        <div className="parameter-row">
          <span className="parameter-label">{label}</span>
          <div className="parameter-inputs">
            <input
              type="range"
              aria-label={label}
              min={parameter.min}
              max={parameter.max}
              step={parameter.step}
              value={value[0]}
              onChange={(event) => props.onChange(Number(event.target.value))}
            />
            <input
              className="parameter-number"
              type="number"
              aria-label={`${label} value`}
              min={parameter.min}
              max={parameter.max}
              step={parameter.step}
              value={value[0]}
              onChange={(event) => props.onChange(Number(event.target.value))}
            />
          </div>
        </div>
      );
  }
}
