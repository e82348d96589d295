import { Fragment } from "react";
import type { FrameworkRenderer } from "../frameworks";
import type { CrudUrls } from "../lib/urls";
import type { Capabilities } from "../types/crud";
import type { FieldDescriptor, RecordRow } from "../types/schema";
import { displayValue } from "./values";

export type DetailViewProps = {
  title: string;
  fields: FieldDescriptor[];
  record: RecordRow;
  pk: string;
  capabilities: Capabilities;
  renderer: FrameworkRenderer;
  urls: CrudUrls;
};

type FieldListProps = {
  fields: FieldDescriptor[];
  record: RecordRow;
};

export function FieldList({ fields, record }: FieldListProps) {
  return (
    <dl className="crud-fields">
      {fields.map((field) => (
        <Fragment key={field.name}>
          <dt>{field.label}</dt>
          <dd>{displayValue(field, record[field.name], "Not set")}</dd>
        </Fragment>
      ))}
    </dl>
  );
}

export default function DetailView({ title, fields, record, pk, capabilities, renderer, urls }: DetailViewProps) {
  return (
    <div className="crud-detail-view">
      <h2>{title}</h2>
      <FieldList fields={fields} record={record} />
      <div className={renderer.layoutClassFor("toolbar")}>
        {capabilities.canUpdate ? renderer.renderButton("Edit", "warning", { href: urls.edit(pk) }) : null}
        {capabilities.canDelete ? renderer.renderButton("Delete", "danger", { href: urls.delete(pk) }) : null}
        {renderer.renderButton("Back to list", "secondary", { href: urls.list })}
      </div>
    </div>
  );
}
