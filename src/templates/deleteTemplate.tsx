import type { FrameworkRenderer } from "../frameworks";
import type { CrudUrls } from "../lib/urls";
import type { FieldDescriptor, RecordRow } from "../types/schema";
import { FieldList } from "./detailTemplate";

export type DeleteViewProps = {
  title: string;
  itemName: string;
  fields: FieldDescriptor[];
  record: RecordRow;
  pk: string;
  renderer: FrameworkRenderer;
  urls: CrudUrls;
};

export default function DeleteView({ title, itemName, fields, record, pk, renderer, urls }: DeleteViewProps) {
  return (
    <div className="crud-delete-view">
      <h2>{title}</h2>
      <p>{`Are you sure you want to delete this ${itemName}?`}</p>
      <FieldList fields={fields} record={record} />
      <form method="post" action={urls.delete(pk)} className={renderer.layoutClassFor("toolbar")}>
        {renderer.renderButton("Delete", "danger")}
        {renderer.renderButton("Cancel", "secondary", { href: urls.view(pk) })}
      </form>
    </div>
  );
}
